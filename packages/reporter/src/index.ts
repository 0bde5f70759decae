import type { CouplingReport, ReportFormat } from "./domain.js";
import { renderMarkdownReport, renderTextReport } from "./renderers.js";

export {
  COUPLING_EXPORT_FILE_NAMES,
  REPORT_SCHEMA_VERSION,
  type CouplingExportKind,
  type CouplingReport,
  type ExportedFile,
  type RenderedExport,
  type ReportFormat,
} from "./domain.js";
export { renderAdjacencyMatrixCsv, renderEdgeListCsv, renderNodeListCsv } from "./csv.js";
export { renderCouplingExports, writeCouplingExports, type ExportWriteHook } from "./export.js";
export { createReport, type CreateReportInput } from "./report.js";

export const formatReport = (report: CouplingReport, format: ReportFormat): string => {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  if (format === "md") {
    return renderMarkdownReport(report);
  }

  return renderTextReport(report);
};
