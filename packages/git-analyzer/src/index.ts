import type { Logger } from "@repometrics/core";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistorySource } from "./infrastructure/git-history-source.js";

export {
  ParseError,
  parseBranches,
  parseCommitStats,
  parseCommits,
  parseContributors,
  parseFileChanges,
  parseTags,
  splitWithLimit,
  type ParseOptions,
} from "./parsing/git-log-parser.js";
export { parseGitDate, type GitDate } from "./parsing/git-date.js";
export {
  ExecGitCommandClient,
  GitCommandError,
  type GitCommandClient,
} from "./infrastructure/git-command-client.js";
export { COMMIT_LOG_FORMAT, GitCliHistorySource, TAG_FORMAT } from "./infrastructure/git-history-source.js";

export const createGitHistorySource = (repositoryPath: string, logger?: Logger): GitCliHistorySource =>
  new GitCliHistorySource(repositoryPath, new ExecGitCommandClient(), logger);
