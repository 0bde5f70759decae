import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ChangeDelta, CommitTransition } from "@cochange/core";
import type { GitCommitRecord, GitHistoryProvider } from "@cochange/git-analyzer";
import { afterEach, describe, expect, it } from "vitest";
import { createStderrLogger } from "./logger.js";
import { RepositoryNotFoundError, runAnalyzeCommand } from "./run-analyze-command.js";

class StubHistoryProvider implements GitHistoryProvider {
  constructor(
    private readonly isGit: boolean,
    private readonly window: readonly GitCommitRecord[],
    private readonly deltasByCommit: Readonly<Record<string, readonly ChangeDelta[]>>,
  ) {}

  isGitRepository(_repositoryPath: string): boolean {
    return this.isGit;
  }

  resolveRepositoryRoot(repositoryPath: string): string {
    return repositoryPath;
  }

  getCommitWindow(_repositoryRoot: string, maxCommits: number): readonly GitCommitRecord[] {
    return this.window.slice(0, maxCommits);
  }

  getTransitionDeltas(_repositoryRoot: string, transition: CommitTransition): readonly ChangeDelta[] {
    return this.deltasByCommit[transition.commit] ?? [];
  }
}

const modified = (path: string): ChangeDelta => ({ status: "M", oldPath: path, newPath: path });

const window: GitCommitRecord[] = [
  { hash: "c3", authorName: "Dev", authoredAtUnix: 1_700_000_300 },
  { hash: "c2", authorName: "Dev", authoredAtUnix: 1_700_000_200 },
  { hash: "c1", authorName: "Dev", authoredAtUnix: 1_700_000_100 },
];

const provider = new StubHistoryProvider(true, window, {
  c3: [modified("lib/x.rb"), modified("config/app.rb"), modified("lib/y.rb")],
  c2: [modified("lib/x.rb"), modified("lib/y.rb")],
});

const cleanupPaths: string[] = [];

const createTempDir = async (): Promise<string> => {
  const root = await mkdtemp(join(tmpdir(), "cochange-analyze-"));
  cleanupPaths.push(root);
  return root;
};

afterEach(async () => {
  for (const path of cleanupPaths.splice(0, cleanupPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

describe("runAnalyzeCommand", () => {
  it("builds the graph from history and writes the exports without rejected paths", async () => {
    const outputDirectory = await createTempDir();

    const result = await runAnalyzeCommand(
      "/work/checkout",
      { maxCommits: 1_000, outputDirectory, strongestEdgeCount: 5 },
      undefined,
      provider,
    );

    expect(result.analysis.graph.nodes).toEqual(["lib/x.rb", "lib/y.rb"]);
    expect(result.analysis.graph.strongestEdges).toEqual([
      { from: "lib/x.rb", to: "lib/y.rb", weight: 2 },
    ]);
    expect(result.report.history).toMatchObject({ commitCount: 3, transitionCount: 2, rejectedPathCount: 1 });
    expect(result.report.exports.map((file) => file.path)).toEqual([
      join(outputDirectory, "node_list.csv"),
      join(outputDirectory, "edge_list.csv"),
      join(outputDirectory, "adjacency_matrix.csv"),
    ]);

    expect(await readFile(join(outputDirectory, "node_list.csv"), "utf8")).toBe(
      "file\nlib/x.rb\nlib/y.rb\n",
    );
    expect(await readFile(join(outputDirectory, "edge_list.csv"), "utf8")).toBe(
      "from,to\nlib/x.rb,lib/y.rb\n",
    );
    expect(await readFile(join(outputDirectory, "adjacency_matrix.csv"), "utf8")).toBe(
      "lib/x.rb,lib/y.rb\n0,2\n0,0\n",
    );
  });

  it("honours a custom rejection pattern and window size", async () => {
    const outputDirectory = await createTempDir();

    const result = await runAnalyzeCommand(
      "/work/checkout",
      { maxCommits: 2, rejectedPathPattern: /y\.rb$/, outputDirectory, strongestEdgeCount: 5 },
      undefined,
      provider,
    );

    expect(result.analysis.graph.nodes).toEqual(["config/app.rb", "lib/x.rb"]);
    expect(result.analysis.graph.edges).toEqual([{ from: "lib/x.rb", to: "config/app.rb" }]);
  });

  it("logs the elapsed time of every stage and of each export", async () => {
    const outputDirectory = await createTempDir();
    const lines: string[] = [];

    await runAnalyzeCommand(
      "/work/checkout",
      { maxCommits: 1_000, outputDirectory, strongestEdgeCount: 5 },
      createStderrLogger("info", (line) => lines.push(line)),
      provider,
    );

    const stages = lines
      .filter((line) => / finished in \d+\.\d{2}s$/.test(line))
      .map((line) => line.replace(/ finished in \d+\.\d{2}s$/, ""));
    expect(stages).toEqual([
      "[cochange] INFO reading history",
      "[cochange] INFO sorting graph",
      "[cochange] INFO building graph",
      "[cochange] INFO writing node_list.csv",
      "[cochange] INFO writing edge_list.csv",
      "[cochange] INFO writing adjacency_matrix.csv",
    ]);
    expect(lines).toContain(
      `[cochange] INFO export: wrote edge_list (1 rows) to ${join(outputDirectory, "edge_list.csv")}`,
    );
  });

  it("aborts before writing anything when the target is not a git repository", async () => {
    const outputDirectory = await createTempDir();
    const lines: string[] = [];

    await expect(
      runAnalyzeCommand(
        "/tmp/plain",
        { maxCommits: 1_000, outputDirectory: join(outputDirectory, "out"), strongestEdgeCount: 5 },
        createStderrLogger("error", (line) => lines.push(line)),
        new StubHistoryProvider(false, [], {}),
      ),
    ).rejects.toBeInstanceOf(RepositoryNotFoundError);

    expect(lines).toEqual(["[cochange] ERROR history: target path is not inside a git repository"]);
    await expect(readFile(join(outputDirectory, "out", "node_list.csv"), "utf8")).rejects.toThrow();
  });
});
