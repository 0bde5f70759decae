import type { ChangeHistory, ChangeSet, CommitTransition } from "@cochange/core";
import { extractChangeSet, tallyChangeSet } from "../domain/change-set.js";
import {
  DEFAULT_HISTORY_WINDOW_CONFIG,
  type GitCommitRecord,
  type HistoryWindowConfig,
} from "../domain/history-types.js";
import { createPathFilter } from "../domain/path-filter.js";
import type { GitHistoryProvider } from "./git-history-provider.js";

export type ReadChangeHistoryInput = {
  repositoryPath: string;
  config?: Partial<HistoryWindowConfig>;
};

export type ChangeHistoryProgressEvent =
  | { stage: "checking_git_repository" }
  | { stage: "not_git_repository" }
  | { stage: "repository_discovered"; repositoryRoot: string }
  | { stage: "loading_commit_window"; maxCommits: number }
  | { stage: "commit_window_loaded"; commits: number }
  | { stage: "transition_diffed"; processed: number; total: number; commit: string }
  | { stage: "history_completed"; transitions: number };

const createEffectiveConfig = (
  overrides: Partial<HistoryWindowConfig> | undefined,
): HistoryWindowConfig => ({
  ...DEFAULT_HISTORY_WINDOW_CONFIG,
  ...overrides,
});

export const toCommitTransitions = (
  window: readonly GitCommitRecord[],
): readonly CommitTransition[] => {
  const transitions: CommitTransition[] = [];
  for (let i = 0; i < window.length - 1; i += 1) {
    const commit = window[i];
    const predecessor = window[i + 1];
    if (commit === undefined || predecessor === undefined) {
      continue;
    }

    transitions.push({ commit: commit.hash, predecessor: predecessor.hash });
  }

  return transitions;
};

export const readChangeHistory = (
  input: ReadChangeHistoryInput,
  historyProvider: GitHistoryProvider,
  onProgress?: (event: ChangeHistoryProgressEvent) => void,
): ChangeHistory => {
  onProgress?.({ stage: "checking_git_repository" });
  if (!historyProvider.isGitRepository(input.repositoryPath)) {
    onProgress?.({ stage: "not_git_repository" });
    return {
      targetPath: input.repositoryPath,
      available: false,
      reason: "not_git_repository",
    };
  }

  const repositoryRoot = historyProvider.resolveRepositoryRoot(input.repositoryPath);
  onProgress?.({ stage: "repository_discovered", repositoryRoot });

  const config = createEffectiveConfig(input.config);
  const filter = createPathFilter(config.rejectedPathPattern);

  onProgress?.({ stage: "loading_commit_window", maxCommits: config.maxCommits });
  const window = historyProvider.getCommitWindow(repositoryRoot, config.maxCommits);
  onProgress?.({ stage: "commit_window_loaded", commits: window.length });

  const transitions = toCommitTransitions(window);
  const changeSets: ChangeSet[] = [];
  let acceptedPathCount = 0;
  let rejectedPathCount = 0;
  let deletedPathCount = 0;

  for (const transition of transitions) {
    const deltas = historyProvider.getTransitionDeltas(repositoryRoot, transition);
    const files = extractChangeSet(deltas, filter);
    const tally = tallyChangeSet(deltas, files);
    acceptedPathCount += tally.accepted;
    rejectedPathCount += tally.rejected;
    deletedPathCount += tally.deleted;

    changeSets.push({ ...transition, files });
    onProgress?.({
      stage: "transition_diffed",
      processed: changeSets.length,
      total: transitions.length,
      commit: transition.commit,
    });
  }

  onProgress?.({ stage: "history_completed", transitions: changeSets.length });

  return {
    targetPath: input.repositoryPath,
    available: true,
    repositoryRoot,
    changeSets,
    metrics: {
      commitCount: window.length,
      transitionCount: changeSets.length,
      maxCommits: config.maxCommits,
      acceptedPathCount,
      rejectedPathCount,
      deletedPathCount,
      newestCommitTimestamp: window[0]?.authoredAtUnix ?? null,
      oldestCommitTimestamp: window[window.length - 1]?.authoredAtUnix ?? null,
    },
  };
};
