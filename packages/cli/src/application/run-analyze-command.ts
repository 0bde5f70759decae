import { resolveTargetPath, type CouplingAnalysisSummary } from "@cochange/core";
import {
  buildCouplingGraphSummary,
  type BuildCouplingGraphProgressEvent,
} from "@cochange/coupling-graph";
import {
  createGitHistoryProvider,
  readChangeHistory,
  type ChangeHistoryProgressEvent,
  type GitHistoryProvider,
  type HistoryWindowConfig,
} from "@cochange/git-analyzer";
import { createReport, writeCouplingExports, type CouplingReport } from "@cochange/reporter";
import { createSilentLogger, type Logger } from "./logger.js";
import { formatElapsed, timed, timedAsync } from "./timing.js";

export type AnalyzeCommandOptions = {
  maxCommits: number;
  rejectedPathPattern?: RegExp;
  outputDirectory?: string;
  strongestEdgeCount: number;
};

export type AnalyzeCommandResult = {
  analysis: CouplingAnalysisSummary;
  report: CouplingReport;
};

export class RepositoryNotFoundError extends Error {
  readonly targetPath: string;

  constructor(targetPath: string) {
    super(`not_git_repository: ${targetPath}`);
    this.name = "RepositoryNotFoundError";
    this.targetPath = targetPath;
  }
}

const createHistoryProgressReporter = (
  logger: Logger,
): ((event: ChangeHistoryProgressEvent) => void) => {
  let lastLoggedTransition = 0;

  return (event) => {
    switch (event.stage) {
      case "checking_git_repository":
        logger.debug("history: checking git repository");
        break;
      case "not_git_repository":
        logger.error("history: target path is not inside a git repository");
        break;
      case "repository_discovered":
        logger.info(`history: repository root ${event.repositoryRoot}`);
        break;
      case "loading_commit_window":
        logger.info(`history: loading up to ${event.maxCommits} commits from HEAD`);
        break;
      case "commit_window_loaded":
        logger.info(`history: loaded ${event.commits} commits`);
        break;
      case "transition_diffed":
        if (
          event.processed === event.total ||
          event.processed === 1 ||
          event.processed - lastLoggedTransition >= 100
        ) {
          lastLoggedTransition = event.processed;
          logger.info(`history: diffed ${event.processed}/${event.total} transitions`);
          logger.debug(`history: last commit diffed ${event.commit}`);
        }
        break;
      case "history_completed":
        logger.debug(`history: completed (${event.transitions} transitions)`);
        break;
    }
  };
};

const createGraphProgressReporter = (
  logger: Logger,
): ((event: BuildCouplingGraphProgressEvent) => void) => {
  let lastLogged = 0;
  let sortStartedAt = 0;

  return (event) => {
    switch (event.stage) {
      case "change_set_accumulated":
        if (event.processed === event.total || event.processed - lastLogged >= 250) {
          lastLogged = event.processed;
          logger.debug(`graph: accumulated ${event.processed}/${event.total} change sets`);
        }
        break;
      case "graph_built":
        logger.info(`graph: ${event.nodeCount} files coupled`);
        break;
      case "sorting_graph":
        sortStartedAt = performance.now();
        break;
      case "graph_sorted":
        logger.info(`sorting graph finished in ${formatElapsed(performance.now() - sortStartedAt)}`);
        break;
    }
  };
};

export const runAnalyzeCommand = async (
  inputPath: string | undefined,
  options: AnalyzeCommandOptions,
  logger: Logger = createSilentLogger(),
  historyProvider: GitHistoryProvider = createGitHistoryProvider(),
): Promise<AnalyzeCommandResult> => {
  const startedAt = performance.now();
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const targetPath = resolveTargetPath(inputPath, invocationCwd).absolutePath;
  const outputDirectory = resolveTargetPath(options.outputDirectory, invocationCwd).absolutePath;
  logger.info(`analyzing repository: ${targetPath}`);

  const config: Partial<HistoryWindowConfig> = {
    maxCommits: options.maxCommits,
    ...(options.rejectedPathPattern === undefined
      ? {}
      : { rejectedPathPattern: options.rejectedPathPattern }),
  };

  const history = timed(logger, "reading history", () =>
    readChangeHistory(
      { repositoryPath: targetPath, config },
      historyProvider,
      createHistoryProgressReporter(logger),
    ),
  );
  if (!history.available) {
    throw new RepositoryNotFoundError(targetPath);
  }

  const graphSummary = timed(logger, "building graph", () =>
    buildCouplingGraphSummary({
      targetPath: history.repositoryRoot,
      changeSets: history.changeSets.map((changeSet) => changeSet.files),
      config: { strongestEdgeCount: options.strongestEdgeCount },
      onProgress: createGraphProgressReporter(logger),
    }),
  );
  logger.debug(
    `graph metrics: nodes=${graphSummary.metrics.nodeCount}, edges=${graphSummary.metrics.edgeCount}, maxWeight=${graphSummary.metrics.maxWeight}`,
  );

  const exports = await writeCouplingExports(graphSummary, outputDirectory, async (rendered, write) => {
    const file = await timedAsync(logger, `writing ${rendered.fileName}`, write);
    logger.info(`export: wrote ${file.kind} (${file.rows} rows) to ${file.path}`);
    return file;
  });

  const analysis: CouplingAnalysisSummary = { history, graph: graphSummary };
  logger.info(`analysis completed in ${formatElapsed(performance.now() - startedAt)}`);

  return {
    analysis,
    report: createReport({ analysis, exports }),
  };
};
