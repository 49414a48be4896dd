import { describe, expect, it } from "vitest";
import { classifyCommitMessage } from "./commit-classifier.js";

describe("classifyCommitMessage", () => {
  it.each([
    ["fix: null pointer in parser", "bugfix"],
    ["  Hotfix for login  ", "bugfix"],
    ["Resolve issue with cache", "bugfix"],
    ["Improve error handling", "feature"],
    ["feat: add export", "feature"],
    ["Add bug fix for flaky retry", "bugfix"],
    ["Add fix for flaky retry", "feature"],
    ["refactor: split module", "maintenance"],
    ["Update dependencies", "maintenance"],
    ["Bump version", "other"],
    ["fixture data", "other"],
  ] as const)("classifies %j as %s", (message, kind) => {
    expect(classifyCommitMessage(message)).toBe(kind);
  });
});
