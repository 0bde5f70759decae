import type { CouplingAnalysisSummary } from "@cochange/core";
import { REPORT_SCHEMA_VERSION, type CouplingReport, type ExportedFile } from "./domain.js";

export type CreateReportInput = {
  analysis: CouplingAnalysisSummary;
  exports: readonly ExportedFile[];
  generatedAt?: string;
};

export const createReport = (input: CreateReportInput): CouplingReport => ({
  schemaVersion: REPORT_SCHEMA_VERSION,
  generatedAt: input.generatedAt ?? new Date().toISOString(),
  repository: {
    targetPath: input.analysis.history.targetPath,
    repositoryRoot: input.analysis.history.repositoryRoot,
  },
  history: input.analysis.history.metrics,
  graph: input.analysis.graph.metrics,
  strongestCouplings: input.analysis.graph.strongestEdges,
  exports: input.exports,
});
