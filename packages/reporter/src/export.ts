import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CouplingGraphSummary } from "@cochange/core";
import { renderAdjacencyMatrixCsv, renderEdgeListCsv, renderNodeListCsv } from "./csv.js";
import {
  COUPLING_EXPORT_FILE_NAMES,
  type ExportedFile,
  type RenderedExport,
} from "./domain.js";

export const renderCouplingExports = (graph: CouplingGraphSummary): readonly RenderedExport[] => [
  {
    kind: "node_list",
    fileName: COUPLING_EXPORT_FILE_NAMES.node_list,
    content: renderNodeListCsv(graph.nodes),
    rows: graph.nodes.length,
  },
  {
    kind: "edge_list",
    fileName: COUPLING_EXPORT_FILE_NAMES.edge_list,
    content: renderEdgeListCsv(graph.edges),
    rows: graph.edges.length,
  },
  {
    kind: "adjacency_matrix",
    fileName: COUPLING_EXPORT_FILE_NAMES.adjacency_matrix,
    content: renderAdjacencyMatrixCsv(graph.adjacencyMatrix),
    rows: graph.adjacencyMatrix.rows.length,
  },
];

/**
 * Wraps the write of a single export. Receives the rendered file and a thunk
 * that writes it; must resolve with the thunk's result.
 */
export type ExportWriteHook = (
  rendered: RenderedExport,
  write: () => Promise<ExportedFile>,
) => Promise<ExportedFile>;

const writeDirectly: ExportWriteHook = (_rendered, write) => write();

/**
 * Writes the three CSV exports into `outputDirectory`, replacing existing
 * files. Files are written one after another; the first failure rejects.
 */
export const writeCouplingExports = async (
  graph: CouplingGraphSummary,
  outputDirectory: string,
  hook: ExportWriteHook = writeDirectly,
): Promise<readonly ExportedFile[]> => {
  await mkdir(outputDirectory, { recursive: true });

  const written: ExportedFile[] = [];
  for (const rendered of renderCouplingExports(graph)) {
    const path = join(outputDirectory, rendered.fileName);
    const file = await hook(rendered, async () => {
      await writeFile(path, rendered.content, "utf8");
      return { kind: rendered.kind, path, rows: rendered.rows };
    });
    written.push(file);
  }

  return written;
};
