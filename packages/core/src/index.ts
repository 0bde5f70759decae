import { resolve } from "node:path";

export type ChangeStatus = "A" | "C" | "D" | "M" | "R" | "T" | "U" | "X";

export type ChangeDelta = {
  status: ChangeStatus;
  oldPath: string | null;
  newPath: string | null;
};

export type CommitTransition = {
  commit: string;
  predecessor: string;
};

export type ChangeSet = CommitTransition & {
  files: readonly string[];
};

export type ChangeHistoryMetrics = {
  commitCount: number;
  transitionCount: number;
  maxCommits: number;
  acceptedPathCount: number;
  rejectedPathCount: number;
  deletedPathCount: number;
  newestCommitTimestamp: number | null;
  oldestCommitTimestamp: number | null;
};

export type ChangeHistoryAvailable = {
  targetPath: string;
  available: true;
  repositoryRoot: string;
  changeSets: readonly ChangeSet[];
  metrics: ChangeHistoryMetrics;
};

export type ChangeHistoryUnavailable = {
  targetPath: string;
  available: false;
  reason: "not_git_repository";
};

export type ChangeHistory = ChangeHistoryAvailable | ChangeHistoryUnavailable;

export type CouplingEdge = {
  from: string;
  to: string;
};

export type WeightedCouplingEdge = CouplingEdge & {
  weight: number;
};

/**
 * Square weight table. `rows[i][j]` is the weight from `header[i]` to `header[j]`.
 */
export type AdjacencyMatrix = {
  header: readonly string[];
  rows: readonly (readonly number[])[];
};

export type CouplingGraphMetrics = {
  nodeCount: number;
  edgeCount: number;
  totalWeight: number;
  maxWeight: number;
};

export type CouplingGraphSummary = {
  targetPath: string;
  nodes: readonly string[];
  edges: readonly CouplingEdge[];
  adjacencyMatrix: AdjacencyMatrix;
  strongestEdges: readonly WeightedCouplingEdge[];
  metrics: CouplingGraphMetrics;
};

export type CouplingAnalysisSummary = {
  history: ChangeHistoryAvailable;
  graph: CouplingGraphSummary;
};

export type TargetPath = {
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string): TargetPath => ({
  absolutePath: resolve(cwd, inputPath ?? "."),
});
