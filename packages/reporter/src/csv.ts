import type { AdjacencyMatrix, CouplingEdge } from "@cochange/core";
import { stringify } from "csv-stringify/sync";

const toCsv = (records: (string | number)[][]): string =>
  stringify(records, { record_delimiter: "unix" });

export const renderNodeListCsv = (nodes: readonly string[]): string =>
  toCsv([["file"], ...nodes.map((node) => [node])]);

export const renderEdgeListCsv = (edges: readonly CouplingEdge[]): string =>
  toCsv([["from", "to"], ...edges.map((edge) => [edge.from, edge.to])]);

export const renderAdjacencyMatrixCsv = (matrix: AdjacencyMatrix): string =>
  toCsv([[...matrix.header], ...matrix.rows.map((row) => [...row])]);
