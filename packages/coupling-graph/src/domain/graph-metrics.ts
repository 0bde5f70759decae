import type {
  CouplingGraphMetrics,
  CouplingGraphSummary,
  WeightedCouplingEdge,
} from "@cochange/core";
import { comparePaths } from "./compare-paths.js";
import type { CouplingGraph } from "./coupling-graph.js";

export type GraphSummaryConfig = {
  strongestEdgeCount: number;
};

export const DEFAULT_GRAPH_SUMMARY_CONFIG: GraphSummaryConfig = {
  strongestEdgeCount: 10,
};

export const selectStrongestEdges = (
  edges: readonly WeightedCouplingEdge[],
  limit: number,
): readonly WeightedCouplingEdge[] =>
  [...edges]
    .sort(
      (a, b) =>
        b.weight - a.weight || comparePaths(a.from, b.from) || comparePaths(a.to, b.to),
    )
    .slice(0, Math.max(0, limit));

export const createCouplingGraphSummary = (
  targetPath: string,
  graph: CouplingGraph,
  config: GraphSummaryConfig = DEFAULT_GRAPH_SUMMARY_CONFIG,
): CouplingGraphSummary => {
  const weightedEdges = graph.toWeightedEdgeList();

  let totalWeight = 0;
  let maxWeight = 0;
  for (const edge of weightedEdges) {
    totalWeight += edge.weight;
    if (edge.weight > maxWeight) {
      maxWeight = edge.weight;
    }
  }

  const nodes = graph.toNodeList();
  const metrics: CouplingGraphMetrics = {
    nodeCount: nodes.length,
    edgeCount: weightedEdges.length,
    totalWeight,
    maxWeight,
  };

  return {
    targetPath,
    nodes,
    edges: graph.toEdgeList(),
    adjacencyMatrix: graph.toAdjacencyMatrix(),
    strongestEdges: selectStrongestEdges(weightedEdges, config.strongestEdgeCount),
    metrics,
  };
};
