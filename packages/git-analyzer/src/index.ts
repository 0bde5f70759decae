import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";

export type { GitHistoryProvider } from "./application/git-history-provider.js";
export {
  readChangeHistory,
  toCommitTransitions,
  type ChangeHistoryProgressEvent,
  type ReadChangeHistoryInput,
} from "./application/read-change-history.js";
export { extractChangeSet, tallyChangeSet, type ChangeSetTally } from "./domain/change-set.js";
export {
  DEFAULT_HISTORY_WINDOW_CONFIG,
  DEFAULT_REJECTED_PATH_PATTERN,
  type GitCommitRecord,
  type HistoryWindowConfig,
} from "./domain/history-types.js";
export { createPathFilter, type PathFilter } from "./domain/path-filter.js";
export { ExecGitCommandClient, GitCommandError, type GitCommandClient } from "./infrastructure/git-command-client.js";
export { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";

export const createGitHistoryProvider = (): GitCliHistoryProvider =>
  new GitCliHistoryProvider(new ExecGitCommandClient());
