import type { ChangeDelta, ChangeStatus } from "@cochange/core";

const KNOWN_STATUSES: ReadonlySet<string> = new Set(["A", "C", "D", "M", "R", "T", "U", "X"]);

const isChangeStatus = (value: string): value is ChangeStatus => KNOWN_STATUSES.has(value);

const toDelta = (status: ChangeStatus, path: string): ChangeDelta => {
  switch (status) {
    case "A":
      return { status, oldPath: null, newPath: path };
    case "D":
      return { status, oldPath: path, newPath: null };
    default:
      return { status, oldPath: path, newPath: path };
  }
};

/**
 * Parses `git diff --name-status -z` output.
 *
 * Each record is a status token followed by one path, or by the source and
 * destination paths for renames and copies (`R100`, `C075`). Delta order is
 * the order git reported.
 */
export const parseNameStatusDiff = (rawDiff: string): readonly ChangeDelta[] => {
  const tokens = rawDiff.split("\u0000");
  const deltas: ChangeDelta[] = [];

  let index = 0;
  while (index < tokens.length) {
    const statusToken = tokens[index]?.trim() ?? "";
    index += 1;
    if (statusToken.length === 0) {
      continue;
    }

    const status = statusToken.charAt(0);
    if (!isChangeStatus(status)) {
      index += 1;
      continue;
    }

    if (status === "R" || status === "C") {
      const oldPath = tokens[index];
      const newPath = tokens[index + 1];
      index += 2;
      if (oldPath === undefined || newPath === undefined) {
        break;
      }

      deltas.push({ status, oldPath, newPath });
      continue;
    }

    const path = tokens[index];
    index += 1;
    if (path === undefined) {
      break;
    }

    deltas.push(toDelta(status, path));
  }

  return deltas;
};
