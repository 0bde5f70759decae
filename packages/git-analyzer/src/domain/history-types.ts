export type GitCommitRecord = {
  hash: string;
  authorName: string;
  authoredAtUnix: number;
};

export type HistoryWindowConfig = {
  maxCommits: number;
  rejectedPathPattern: RegExp;
};

export const DEFAULT_REJECTED_PATH_PATTERN =
  /(assets|design-system|views|db\/|\.yml|spec|config\/|gitignore|Gemfile)/;

export const DEFAULT_HISTORY_WINDOW_CONFIG: HistoryWindowConfig = {
  maxCommits: 1_000,
  rejectedPathPattern: DEFAULT_REJECTED_PATH_PATTERN,
};
