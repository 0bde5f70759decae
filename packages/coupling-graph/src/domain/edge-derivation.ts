import type { CouplingGraph } from "./coupling-graph.js";

export type CoChangeInsertion = {
  source: string;
  targets: readonly string[];
};

/**
 * Pairs every changed file with the files listed after it.
 *
 * For `files[i]` the targets are `files[i..]` without any entry equal to
 * `files[i]`; repeats of other files stay and count once each. Only the
 * earlier-listed file of a pair receives the edge, so the direction follows
 * the order git reported the paths in.
 */
export const deriveCoChangeInsertions = (
  files: readonly string[],
): readonly CoChangeInsertion[] =>
  files.map((source, index) => ({
    source,
    targets: files.slice(index).filter((path) => path !== source),
  }));

export const accumulateChangeSet = (graph: CouplingGraph, files: readonly string[]): void => {
  for (const insertion of deriveCoChangeInsertions(files)) {
    graph.add(insertion.source, insertion.targets);
  }
};
