import type { ChangeDelta } from "@cochange/core";
import type { PathFilter } from "./path-filter.js";

export type ChangeSetTally = {
  accepted: number;
  rejected: number;
  deleted: number;
};

export const extractChangeSet = (
  deltas: readonly ChangeDelta[],
  filter: PathFilter,
): readonly string[] => {
  const files: string[] = [];
  for (const delta of deltas) {
    if (delta.newPath === null) {
      continue;
    }

    if (filter.accepts(delta.newPath)) {
      files.push(delta.newPath);
    }
  }

  return files;
};

export const tallyChangeSet = (
  deltas: readonly ChangeDelta[],
  files: readonly string[],
): ChangeSetTally => {
  const deleted = deltas.filter((delta) => delta.newPath === null).length;
  return {
    accepted: files.length,
    rejected: deltas.length - deleted - files.length,
    deleted,
  };
};
