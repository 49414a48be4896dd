import {
  createSilentLogger,
  type Commit,
  type Contributor,
  type FileChange,
  type FileCommitIndex,
  type Logger,
  type Tag,
} from "@repometrics/core";
import { parseGitDate, type GitDate } from "./git-date.js";

export class ParseError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "ParseError";
    this.input = input;
  }
}

export type ParseOptions = {
  logger?: Logger;
};

const FIELD_SEPARATOR = "|";
const COMMIT_FIELD_COUNT = 5;
const HEADER_MIN_SEPARATORS = 4;

const NUMSTAT_LINE = /^(\d+|-)\s+(\d+|-)\s+(.+)$/;
const COMMIT_HASH_LINE = /^[a-f0-9]{40}$/;
const SHORTLOG_LINE = /^\s*(\d+)\s+(.+)$/;
const NAME_WITH_EMAIL = /^(.+)\s+<(.+)>$/;

const toLines = (text: string): string[] =>
  text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

/** Splits into at most `limit` fields; the last field keeps any further separators. */
export const splitWithLimit = (line: string, separator: string, limit: number): string[] => {
  const fields: string[] = [];
  let rest = line;

  while (fields.length < limit - 1) {
    const index = rest.indexOf(separator);
    if (index === -1) {
      break;
    }

    fields.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }

  fields.push(rest);
  return fields;
};

const countSeparators = (line: string): number => line.split(FIELD_SEPARATOR).length - 1;

const requireDate = (value: string): GitDate => {
  const parsed = parseGitDate(value);
  if (parsed === null) {
    throw new ParseError(`Unparseable git date: ${value}`, value);
  }

  return parsed;
};

const parseChangeCount = (value: string): number => (value === "-" ? 0 : Number.parseInt(value, 10));

const parseRenamedPath = (pathSpec: string): string => {
  if (!pathSpec.includes(" => ")) {
    return pathSpec;
  }

  const braceRenameMatch = pathSpec.match(/^(.*)\{(.*) => (.*)\}(.*)$/);
  if (braceRenameMatch !== null) {
    const [, prefix = "", , renamedTo = "", suffix = ""] = braceRenameMatch;
    return `${prefix}${renamedTo}${suffix}`.replace(/\/\//g, "/");
  }

  const parts = pathSpec.split(" => ");
  return parts[parts.length - 1] ?? pathSpec;
};

const parseCommitHeader = (line: string): Commit | null => {
  const fields = splitWithLimit(line, FIELD_SEPARATOR, COMMIT_FIELD_COUNT);
  const [hash, authorName, authorEmail, date, subject] = fields;
  if (
    hash === undefined ||
    authorName === undefined ||
    authorEmail === undefined ||
    date === undefined ||
    subject === undefined
  ) {
    return null;
  }

  const { timestamp, utcOffsetMinutes } = requireDate(date);
  return {
    hash,
    authorName,
    authorEmail: authorEmail.length > 0 ? authorEmail : null,
    timestamp,
    utcOffsetMinutes,
    subject,
    fileChanges: [],
    additions: 0,
    deletions: 0,
  };
};

/** Any failure yields the empty result; partial output is never returned. */
const parseOrEmpty = <T>(operation: string, options: ParseOptions | undefined, empty: () => T, parse: () => T): T => {
  const logger = options?.logger ?? createSilentLogger();
  try {
    return parse();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`${operation}: ${message}; discarding output`);
    return empty();
  }
};

export const parseCommits = (text: string, options?: ParseOptions): readonly Commit[] =>
  parseOrEmpty<readonly Commit[]>("parse commits", options, () => [], () => {
    const commits: Commit[] = [];
    for (const line of toLines(text)) {
      const commit = parseCommitHeader(line);
      if (commit !== null) {
        commits.push(commit);
      }
    }

    options?.logger?.debug(`parsed ${commits.length} commits`);
    return commits;
  });

type MutableCommit = Omit<Commit, "fileChanges"> & { fileChanges: FileChange[] };

export const parseCommitStats = (text: string, options?: ParseOptions): readonly Commit[] =>
  parseOrEmpty<readonly Commit[]>("parse commit stats", options, () => [], () => {
    const commits: MutableCommit[] = [];
    let current: MutableCommit | null = null;

    for (const line of toLines(text)) {
      if (countSeparators(line) >= HEADER_MIN_SEPARATORS) {
        const header = parseCommitHeader(line);
        if (header !== null) {
          current = { ...header, fileChanges: [] };
          commits.push(current);
        }
        continue;
      }

      const numstat = line.match(NUMSTAT_LINE);
      if (numstat === null || current === null) {
        continue;
      }

      const [, additionsRaw = "-", deletionsRaw = "-", pathSpec = ""] = numstat;
      const change: FileChange = {
        filename: parseRenamedPath(pathSpec),
        additions: parseChangeCount(additionsRaw),
        deletions: parseChangeCount(deletionsRaw),
      };
      current.fileChanges.push(change);
      current.additions += change.additions;
      current.deletions += change.deletions;
    }

    options?.logger?.debug(`parsed stats for ${commits.length} commits`);
    return commits;
  });

export const parseFileChanges = (text: string, options?: ParseOptions): FileCommitIndex =>
  parseOrEmpty<FileCommitIndex>("parse file changes", options, () => new Map<string, string[]>(), () => {
    const index = new Map<string, string[]>();
    let currentHash: string | null = null;

    for (const line of toLines(text)) {
      if (COMMIT_HASH_LINE.test(line)) {
        currentHash = line;
        continue;
      }

      if (currentHash === null) {
        continue;
      }

      const hashes = index.get(line);
      if (hashes === undefined) {
        index.set(line, [currentHash]);
      } else {
        hashes.push(currentHash);
      }
    }

    return index;
  });

export const parseContributors = (text: string, options?: ParseOptions): readonly Contributor[] =>
  parseOrEmpty<readonly Contributor[]>("parse contributors", options, () => [], () => {
    const contributors: Contributor[] = [];

    for (const line of toLines(text)) {
      const match = line.match(SHORTLOG_LINE);
      if (match === null) {
        continue;
      }

      const [, countRaw = "0", identity = ""] = match;
      const identityMatch = identity.match(NAME_WITH_EMAIL);
      const name = identityMatch?.[1]?.trim() ?? identity.trim();
      const email = identityMatch?.[2]?.trim() ?? null;

      contributors.push({
        name,
        email: email !== null && email.length > 0 ? email : null,
        commitCount: Number.parseInt(countRaw, 10),
      });
    }

    return contributors;
  });

export const parseTags = (text: string, options?: ParseOptions): readonly Tag[] =>
  parseOrEmpty<readonly Tag[]>("parse tags", options, () => [], () => {
    const tags: Tag[] = [];

    for (const line of toLines(text)) {
      const [name = "", date = "", objectHash = ""] = splitWithLimit(line, FIELD_SEPARATOR, 3);
      if (name.length === 0 || date.trim().length === 0) {
        continue;
      }

      const { timestamp, utcOffsetMinutes } = requireDate(date);
      tags.push({
        name,
        timestamp,
        utcOffsetMinutes,
        commitHash: objectHash.length > 0 ? objectHash : null,
      });
    }

    return tags;
  });

export const parseBranches = (text: string, options?: ParseOptions): readonly string[] =>
  parseOrEmpty<readonly string[]>("parse branches", options, () => [], () => {
    const branches = new Set<string>();

    for (const line of toLines(text)) {
      if (line.includes("->")) {
        continue;
      }

      const name = line.replace(/^\*\s*/, "").replace(/^remotes\//, "");
      if (name.length > 0) {
        branches.add(name);
      }
    }

    return [...branches];
  });
