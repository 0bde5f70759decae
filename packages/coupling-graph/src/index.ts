export {
  buildCouplingGraph,
  buildCouplingGraphSummary,
  type BuildCouplingGraphProgressEvent,
  type BuildCouplingGraphSummaryInput,
} from "./application/build-coupling-graph.js";
export { comparePaths } from "./domain/compare-paths.js";
export { CouplingGraph } from "./domain/coupling-graph.js";
export {
  accumulateChangeSet,
  deriveCoChangeInsertions,
  type CoChangeInsertion,
} from "./domain/edge-derivation.js";
export { FileNode } from "./domain/file-node.js";
export {
  createCouplingGraphSummary,
  DEFAULT_GRAPH_SUMMARY_CONFIG,
  selectStrongestEdges,
  type GraphSummaryConfig,
} from "./domain/graph-metrics.js";
