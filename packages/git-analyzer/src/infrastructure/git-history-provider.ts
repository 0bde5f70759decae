import type { ChangeDelta, CommitTransition } from "@cochange/core";
import type { GitHistoryProvider } from "../application/git-history-provider.js";
import { GIT_LOG_FORMAT } from "../domain/git-log-format.js";
import type { GitCommitRecord } from "../domain/history-types.js";
import { parseNameStatusDiff } from "../parsing/git-diff-parser.js";
import { parseGitLog } from "../parsing/git-log-parser.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory"];
const UNBORN_HEAD_CODES = ["does not have any commits yet", "ambiguous argument 'head'"];

const messageIncludesAny = (error: GitCommandError, codes: readonly string[]): boolean => {
  const lower = error.message.toLowerCase();
  return codes.some((code) => lower.includes(code));
};

export class GitCliHistoryProvider implements GitHistoryProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  isGitRepository(repositoryPath: string): boolean {
    try {
      const output = this.gitClient.run(repositoryPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && messageIncludesAny(error, NON_GIT_CODES)) {
        return false;
      }

      throw error;
    }
  }

  resolveRepositoryRoot(repositoryPath: string): string {
    return this.gitClient.run(repositoryPath, ["rev-parse", "--show-toplevel"]).trim();
  }

  getCommitWindow(repositoryRoot: string, maxCommits: number): readonly GitCommitRecord[] {
    try {
      const output = this.gitClient.run(repositoryRoot, [
        "log",
        `--max-count=${maxCommits}`,
        `--pretty=format:${GIT_LOG_FORMAT}`,
        "HEAD",
      ]);
      return parseGitLog(output);
    } catch (error) {
      if (error instanceof GitCommandError && messageIncludesAny(error, UNBORN_HEAD_CODES)) {
        return [];
      }

      throw error;
    }
  }

  getTransitionDeltas(repositoryRoot: string, transition: CommitTransition): readonly ChangeDelta[] {
    const output = this.gitClient.run(repositoryRoot, [
      "-c",
      "core.quotepath=false",
      "diff-tree",
      "-r",
      "--name-status",
      "-z",
      "--no-renames",
      transition.predecessor,
      transition.commit,
    ]);
    return parseNameStatusDiff(output);
  }
}
