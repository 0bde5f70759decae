import { Command, Option } from "commander";
import { DEFAULT_HISTORY_WINDOW_CONFIG } from "@cochange/git-analyzer";
import { DEFAULT_GRAPH_SUMMARY_CONFIG } from "@cochange/coupling-graph";
import { formatReport, type ReportFormat } from "@cochange/reporter";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { parsePattern, parsePositiveCount } from "./application/parse-options.js";
import { runAnalyzeCommand } from "./application/run-analyze-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");

const readPackageVersion = (): string => {
  const manifest: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }

  return "0.0.0";
};

const defaultLogLevel = parseLogLevel(process.env["COCHANGE_LOG_LEVEL"]);

program
  .name("cochange")
  .description("Mine git history for files that change together")
  .version(readPackageVersion());

program
  .command("analyze")
  .argument("[path]", "directory inside the repository to analyze")
  .option(
    "--max-commits <count>",
    "number of commits walked back from HEAD",
    parsePositiveCount,
    DEFAULT_HISTORY_WINDOW_CONFIG.maxCommits,
  )
  .addOption(
    new Option("--reject-pattern <regex>", "regular expression of paths left out of the graph")
      .argParser(parsePattern)
      .default(
        DEFAULT_HISTORY_WINDOW_CONFIG.rejectedPathPattern,
        DEFAULT_HISTORY_WINDOW_CONFIG.rejectedPathPattern.source,
      ),
  )
  .option("--out-dir <path>", "directory receiving the CSV exports", ".")
  .option(
    "--top <count>",
    "number of strongest couplings shown in the report",
    parsePositiveCount,
    DEFAULT_GRAPH_SUMMARY_CONFIG.strongestEdgeCount,
  )
  .addOption(
    new Option("--format <mode>", "report format: text, md, json")
      .choices(["text", "md", "json"])
      .default("text"),
  )
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(defaultLogLevel),
  )
  .action(
    async (
      path: string | undefined,
      options: {
        maxCommits: number;
        rejectPattern: RegExp;
        outDir: string;
        top: number;
        format: ReportFormat;
        logLevel: LogLevel;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      const result = await runAnalyzeCommand(
        path,
        {
          maxCommits: options.maxCommits,
          rejectedPathPattern: options.rejectPattern,
          outputDirectory: options.outDir,
          strongestEdgeCount: options.top,
        },
        logger,
      );
      process.stdout.write(`${formatReport(result.report, options.format)}\n`);
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

try {
  await program.parseAsync(argv);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  createStderrLogger(defaultLogLevel === "silent" ? "error" : defaultLogLevel).error(message);
  process.exitCode = 1;
}
