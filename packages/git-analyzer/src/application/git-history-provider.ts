import type { ChangeDelta, CommitTransition } from "@cochange/core";
import type { GitCommitRecord } from "../domain/history-types.js";

export interface GitHistoryProvider {
  isGitRepository(repositoryPath: string): boolean;
  resolveRepositoryRoot(repositoryPath: string): string;
  getCommitWindow(repositoryRoot: string, maxCommits: number): readonly GitCommitRecord[];
  getTransitionDeltas(repositoryRoot: string, transition: CommitTransition): readonly ChangeDelta[];
}
