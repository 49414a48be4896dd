import { resolve } from "node:path";
import {
  createSilentLogger,
  timeWindowToJSON,
  type Logger,
  type MetricCategory,
  type MetricsRunReport,
  type RepositoryHistorySource,
} from "@repometrics/core";
import { createGitHistorySource } from "@repometrics/git-analyzer";
import { runMetrics, type MetricsRunProgressEvent } from "@repometrics/metrics";
import { resolveAnalysisWindow, type WindowOptions } from "./parse-analyze-options.js";

export class NotGitRepositoryError extends Error {
  readonly repositoryPath: string;

  constructor(repositoryPath: string) {
    super(`Not a git repository: ${repositoryPath}`);
    this.name = "NotGitRepositoryError";
    this.repositoryPath = repositoryPath;
  }
}

export type AnalyzeHistorySource = RepositoryHistorySource & {
  isGitRepository(): boolean;
  getEarliestCommitTimestamp(): number | null;
};

export type AnalyzeCommandOptions = WindowOptions & {
  metrics: readonly string[];
  categories: readonly MetricCategory[];
  contributors: readonly string[];
  excludeBots: boolean;
  includeMergeCommits: boolean;
};

export type AnalyzeCommandDependencies = {
  createSource?: (repositoryPath: string, logger: Logger) => AnalyzeHistorySource;
  now?: () => Date;
  cwd?: string;
};

const resolveTargetPath = (inputPath: string | undefined, cwd: string): string =>
  resolve(cwd, inputPath ?? ".");

export const createMetricsProgressReporter = (logger: Logger): ((event: MetricsRunProgressEvent) => void) => {
  let completed = 0;

  return (event) => {
    switch (event.stage) {
      case "source_loaded":
        logger.info(`history: loaded ${event.records} ${event.source} records`);
        break;
      case "metric_started":
        logger.debug(`metrics: ${event.metricName} started`);
        break;
      case "metric_completed":
        completed += 1;
        if (event.ok) {
          logger.info(`metrics: ${event.metricName} completed in ${event.executionTime}s (${completed} done)`);
        } else {
          logger.debug(`metrics: ${event.metricName} failed after ${event.executionTime}s (${completed} done)`);
        }
        break;
    }
  };
};

export const runAnalyzeCommand = (
  inputPath: string | undefined,
  options: AnalyzeCommandOptions,
  logger: Logger = createSilentLogger(),
  dependencies: AnalyzeCommandDependencies = {},
): MetricsRunReport => {
  const invocationCwd = dependencies.cwd ?? process.env["INIT_CWD"] ?? process.cwd();
  const targetPath = resolveTargetPath(inputPath, invocationCwd);
  const now = dependencies.now ?? (() => new Date());
  logger.info(`analyzing repository: ${targetPath}`);

  const source = (dependencies.createSource ?? createGitHistorySource)(targetPath, logger);
  logger.debug("checking git repository");
  if (!source.isGitRepository()) {
    throw new NotGitRepositoryError(targetPath);
  }

  const timeWindow = resolveAnalysisWindow(options, now(), () => source.getEarliestCommitTimestamp());
  const window = timeWindowToJSON(timeWindow);
  logger.info(`time window: ${window.start} .. ${window.end} (${window.durationDays} days)`);

  const report = runMetrics(
    {
      repository: targetPath,
      timeWindow,
      metrics: options.metrics,
      categories: options.categories,
      options: {
        contributors: options.contributors,
        excludeBots: options.excludeBots,
        includeMergeCommits: options.includeMergeCommits,
      },
    },
    source,
    { logger, now, onProgress: createMetricsProgressReporter(logger) },
  );

  logger.info(`analysis completed (succeeded=${report.succeeded}, failed=${report.failed})`);
  return report;
};
