import { COMMIT_FIELD_SEPARATOR, COMMIT_RECORD_SEPARATOR } from "../domain/git-log-format.js";
import type { GitCommitRecord } from "../domain/history-types.js";

const parseInteger = (value: string): number | null => {
  if (value.length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return null;
  }

  return parsed;
};

/**
 * Parses `git log` headers written with `GIT_LOG_FORMAT`.
 *
 * Records stay in the order git walked them (newest first); malformed
 * records are skipped.
 */
export const parseGitLog = (rawLog: string): readonly GitCommitRecord[] => {
  const records = rawLog
    .split(COMMIT_RECORD_SEPARATOR)
    .map((record) => record.trim())
    .filter((record) => record.length > 0);

  const commits: GitCommitRecord[] = [];

  for (const record of records) {
    const header = record.split("\n")[0] ?? "";
    const headerParts = header.split(COMMIT_FIELD_SEPARATOR);
    if (headerParts.length !== 3) {
      continue;
    }

    const [hash, authoredAtRaw, authorName] = headerParts;
    if (hash === undefined || authoredAtRaw === undefined || authorName === undefined) {
      continue;
    }

    const authoredAtUnix = parseInteger(authoredAtRaw);
    if (hash.length === 0 || authoredAtUnix === null) {
      continue;
    }

    commits.push({
      hash,
      authorName: authorName.trim(),
      authoredAtUnix,
    });
  }

  return commits;
};
