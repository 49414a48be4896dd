import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { createStderrLogger, describeError, parseLogLevel, type LogLevel } from "@repometrics/core";
import { formatMetricList } from "./application/format-metric-list.js";
import { formatMetricsOutput, type AnalyzeOutputMode } from "./application/format-metrics-output.js";
import { parseCategoryOption, parseListOption } from "./application/parse-analyze-options.js";
import { runAnalyzeCommand } from "./application/run-analyze-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
const version =
  typeof packageJson === "object" && packageJson !== null && "version" in packageJson
    ? String(packageJson.version)
    : "0.0.0";

program
  .name("repometrics")
  .description("Engineering metrics from git history: activity, churn, ownership, coupling and delivery flow")
  .version(version);

program
  .command("analyze")
  .argument("[path]", "path to the git repository to analyze")
  .option("--since <time>", "start of the window: 30d, 2w, 3m, 1y or a date (default: 30d)")
  .option("--until <time>", "end of the window: 30d, 2w, 3m, 1y or a date (default: now)")
  .option("--all-time", "analyze from the first commit in the repository")
  .option("--metrics <names>", "comma-separated metric names to run")
  .option("--category <names>", "comma-separated categories: commit_activity, code_churn, reliability, flow")
  .option("--contributors <names>", "comma-separated author names or emails to keep")
  .option("--exclude-bots", "drop commits from bot identities")
  .option("--no-merge-commits", "drop merge commits for metrics that do not need them")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env["REPOMETRICS_LOG_LEVEL"])),
  )
  .addOption(
    new Option("--output <mode>", "output mode: summary (default) or json (full results)")
      .choices(["summary", "json"])
      .default("summary"),
  )
  .option("--json", "shortcut for --output json")
  .action(
    (
      path: string | undefined,
      options: {
        since?: string;
        until?: string;
        allTime?: boolean;
        metrics?: string;
        category?: string;
        contributors?: string;
        excludeBots?: boolean;
        mergeCommits: boolean;
        logLevel: LogLevel;
        output: AnalyzeOutputMode;
        json?: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const report = runAnalyzeCommand(
          path,
          {
            ...(options.since === undefined ? {} : { since: options.since }),
            ...(options.until === undefined ? {} : { until: options.until }),
            allTime: options.allTime === true,
            metrics: parseListOption(options.metrics),
            categories: parseCategoryOption(options.category),
            contributors: parseListOption(options.contributors),
            excludeBots: options.excludeBots === true,
            includeMergeCommits: options.mergeCommits,
          },
          logger,
        );
        const outputMode: AnalyzeOutputMode = options.json === true ? "json" : options.output;
        process.stdout.write(`${formatMetricsOutput(report, outputMode)}\n`);
      } catch (error) {
        const { errorClass, message } = describeError(error);
        logger.error(`${errorClass}: ${message}`);
        process.exitCode = 1;
      }
    },
  );

program
  .command("metrics")
  .description("list available metrics by category")
  .action(() => {
    process.stdout.write(`${formatMetricList()}\n`);
  });

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

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
