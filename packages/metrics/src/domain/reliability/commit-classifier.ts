export type CommitKind = "bugfix" | "feature" | "maintenance" | "other";

export const COMMIT_KINDS: readonly CommitKind[] = ["bugfix", "feature", "maintenance", "other"];

// Checked in order; the first kind with a matching pattern wins.
const PATTERNS: readonly { kind: Exclude<CommitKind, "other">; patterns: readonly RegExp[] }[] = [
  {
    kind: "bugfix",
    patterns: [
      /^fix\b/,
      /^bugfix/,
      /\bfix\s+(bug|issue|error|problem)/,
      /\b(bug|error|issue)\s+fix/,
      /\bresol(ve|ution)\b/,
      /\bhotfix/,
      /\bpatch/,
      /\bcorrect/,
      /\brepair/,
      /\bhandle\s+(error|exception)/,
    ],
  },
  {
    kind: "feature",
    patterns: [
      /^feat\b/,
      /^feature/,
      /^add\b/,
      /^implement/,
      /^create/,
      /^new\s+/,
      /\benhance/,
      /\bimprove/,
      /\bupgrade/,
      /\bextend/,
    ],
  },
  {
    kind: "maintenance",
    patterns: [
      /^refactor/,
      /^clean/,
      /^update/,
      /^chore/,
      /^style/,
      /^format/,
      /^lint/,
      /^test/,
      /^spec/,
      /\bdocument/,
      /\bcomment/,
      /\btypo/,
      /\bwhitespace/,
      /\breorg/,
      /\bmove\s/,
      /\brename/,
    ],
  },
];

export const classifyCommitMessage = (message: string): CommitKind => {
  const normalized = message.trim().toLowerCase();
  const match = PATTERNS.find(({ patterns }) => patterns.some((pattern) => pattern.test(normalized)));
  return match?.kind ?? "other";
};
