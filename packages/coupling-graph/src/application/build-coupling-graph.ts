import type { CouplingGraphSummary } from "@cochange/core";
import { CouplingGraph } from "../domain/coupling-graph.js";
import { accumulateChangeSet } from "../domain/edge-derivation.js";
import {
  createCouplingGraphSummary,
  DEFAULT_GRAPH_SUMMARY_CONFIG,
  type GraphSummaryConfig,
} from "../domain/graph-metrics.js";

export type BuildCouplingGraphProgressEvent =
  | { stage: "change_set_accumulated"; processed: number; total: number; files: number }
  | { stage: "graph_built"; nodeCount: number }
  | { stage: "sorting_graph"; nodeCount: number }
  | { stage: "graph_sorted"; nodeCount: number };

export const buildCouplingGraph = (
  changeSets: readonly (readonly string[])[],
  onProgress?: (event: BuildCouplingGraphProgressEvent) => void,
): CouplingGraph => {
  const graph = new CouplingGraph();

  changeSets.forEach((files, index) => {
    accumulateChangeSet(graph, files);
    onProgress?.({
      stage: "change_set_accumulated",
      processed: index + 1,
      total: changeSets.length,
      files: files.length,
    });
  });

  onProgress?.({ stage: "graph_built", nodeCount: graph.size });
  return graph;
};

export type BuildCouplingGraphSummaryInput = {
  targetPath: string;
  changeSets: readonly (readonly string[])[];
  config?: Partial<GraphSummaryConfig>;
  onProgress?: (event: BuildCouplingGraphProgressEvent) => void;
};

export const buildCouplingGraphSummary = (
  input: BuildCouplingGraphSummaryInput,
): CouplingGraphSummary => {
  const graph = buildCouplingGraph(input.changeSets, input.onProgress);
  input.onProgress?.({ stage: "sorting_graph", nodeCount: graph.size });
  graph.sortByPath();
  input.onProgress?.({ stage: "graph_sorted", nodeCount: graph.size });
  return createCouplingGraphSummary(input.targetPath, graph, {
    ...DEFAULT_GRAPH_SUMMARY_CONFIG,
    ...input.config,
  });
};
