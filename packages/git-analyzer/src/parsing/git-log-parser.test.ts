import { describe, expect, it } from "vitest";
import { parseGitLog } from "./git-log-parser.js";

describe("parseGitLog", () => {
  it("keeps commits in walk order", () => {
    const raw = [
      "\u001eabc123\u001f1700003600\u001fAlice",
      "\u001edef456\u001f1700000000\u001f Bob ",
      "",
    ].join("\n");

    expect(parseGitLog(raw)).toEqual([
      { hash: "abc123", authorName: "Alice", authoredAtUnix: 1700003600 },
      { hash: "def456", authorName: "Bob", authoredAtUnix: 1700000000 },
    ]);
  });

  it("skips records with missing fields or a non-numeric timestamp", () => {
    const raw = [
      "\u001eabc123\u001fyesterday\u001fAlice",
      "\u001edef456\u001f1700000000",
      "\u001e0a1b2c\u001f1700000100\u001fCarol",
    ].join("\n");

    expect(parseGitLog(raw).map((commit) => commit.hash)).toEqual(["0a1b2c"]);
  });

  it("returns no commits for empty output", () => {
    expect(parseGitLog("")).toEqual([]);
  });
});
