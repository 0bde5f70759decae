import type {
  ChangeHistoryMetrics,
  CouplingGraphMetrics,
  WeightedCouplingEdge,
} from "@cochange/core";

export const REPORT_SCHEMA_VERSION = "cochange.report.v1" as const;

export type ReportSchemaVersion = typeof REPORT_SCHEMA_VERSION;

export type ReportFormat = "json" | "text" | "md";

export const COUPLING_EXPORT_FILE_NAMES = {
  node_list: "node_list.csv",
  edge_list: "edge_list.csv",
  adjacency_matrix: "adjacency_matrix.csv",
} as const;

export type CouplingExportKind = keyof typeof COUPLING_EXPORT_FILE_NAMES;

export type RenderedExport = {
  kind: CouplingExportKind;
  fileName: string;
  content: string;
  rows: number;
};

export type ExportedFile = {
  kind: CouplingExportKind;
  path: string;
  rows: number;
};

export type CouplingReport = {
  schemaVersion: ReportSchemaVersion;
  generatedAt: string;
  repository: {
    targetPath: string;
    repositoryRoot: string;
  };
  history: ChangeHistoryMetrics;
  graph: CouplingGraphMetrics;
  strongestCouplings: readonly WeightedCouplingEdge[];
  exports: readonly ExportedFile[];
};

export const formatUnixTimestamp = (value: number | null): string =>
  value === null ? "n/a" : new Date(value * 1000).toISOString();
