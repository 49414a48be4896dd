import {
  createSilentLogger,
  type Commit,
  type Contributor,
  type FileCommitIndex,
  type Logger,
  type RepositoryHistorySource,
  type Tag,
  type TimeWindow,
} from "@repometrics/core";
import {
  parseBranches,
  parseCommitStats,
  parseCommits,
  parseContributors,
  parseFileChanges,
  parseTags,
} from "../parsing/git-log-parser.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory"];

export const COMMIT_LOG_FORMAT = "%H|%an|%ae|%ad|%s";
export const TAG_FORMAT = "%(refname:short)|%(creatordate:iso-strict)|%(objectname)";

const isNotGitError = (error: GitCommandError): boolean => {
  const lower = error.message.toLowerCase();
  return NON_GIT_CODES.some((code) => lower.includes(code));
};

const windowArgs = (window: TimeWindow): string[] => [
  `--since=${new Date(window.start * 1000).toISOString()}`,
  `--until=${new Date(window.end * 1000).toISOString()}`,
];

export class GitCliHistorySource implements RepositoryHistorySource {
  private readonly logger: Logger;

  constructor(
    private readonly repositoryPath: string,
    private readonly gitClient: GitCommandClient,
    logger?: Logger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  isGitRepository(): boolean {
    try {
      const output = this.gitClient.run(this.repositoryPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && isNotGitError(error)) {
        return false;
      }

      throw error;
    }
  }

  getCommits(window: TimeWindow): readonly Commit[] {
    const output = this.runGit([
      "-c",
      "core.quotepath=false",
      "log",
      "--all",
      "--date=iso-strict",
      `--pretty=format:${COMMIT_LOG_FORMAT}`,
      ...windowArgs(window),
    ]);
    return parseCommits(output, { logger: this.logger });
  }

  getCommitStats(window: TimeWindow): readonly Commit[] {
    const output = this.runGit([
      "-c",
      "core.quotepath=false",
      "log",
      "--all",
      "--date=iso-strict",
      `--pretty=format:${COMMIT_LOG_FORMAT}`,
      "--numstat",
      ...windowArgs(window),
    ]);
    return parseCommitStats(output, { logger: this.logger });
  }

  getFileChanges(window: TimeWindow): FileCommitIndex {
    const output = this.runGit([
      "-c",
      "core.quotepath=false",
      "log",
      "--all",
      "--pretty=format:%H",
      "--name-only",
      ...windowArgs(window),
    ]);
    return parseFileChanges(output, { logger: this.logger });
  }

  getContributors(window: TimeWindow): readonly Contributor[] {
    // shortlog reads stdin when it has no tty, so HEAD/--all must be explicit.
    const output = this.runGit(["shortlog", "-sne", "--all", ...windowArgs(window)]);
    return parseContributors(output, { logger: this.logger });
  }

  getTags(): readonly Tag[] {
    const output = this.runGit(["tag", "-l", "--sort=-creatordate", `--format=${TAG_FORMAT}`]);
    return parseTags(output, { logger: this.logger });
  }

  getBranches(): readonly string[] {
    const output = this.runGit(["branch", "-a", "--format=%(refname:short)"]);
    return parseBranches(output, { logger: this.logger });
  }

  /** Unix seconds of the oldest commit reachable from any ref, or null for an empty repository. */
  getEarliestCommitTimestamp(): number | null {
    const output = this.runGit(["log", "--all", "--format=%at"]);
    let earliest: number | null = null;

    for (const line of output.split("\n")) {
      const value = Number.parseInt(line.trim(), 10);
      if (Number.isNaN(value)) {
        continue;
      }

      earliest = earliest === null ? value : Math.min(earliest, value);
    }

    return earliest;
  }

  private runGit(args: readonly string[]): string {
    this.logger.debug(`git ${args.join(" ")}`);
    return this.gitClient.run(this.repositoryPath, args);
  }
}
