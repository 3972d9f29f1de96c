import { describe, expect, it } from "vitest";
import {
  countCommentedLines,
  describeApproval,
  groupPullRequestComments,
  isBinaryPath,
  requirePullRequestTarget,
  summarizePullRequest,
  toChangedFiles,
} from "../../src/core/pr/summary.js";
import { APPROVED_EVALUATION, COMMENT_THREADS, DIFFERENCES, PARTIAL_EVALUATION, pullRequestFixture } from "../fixtures.js";

describe("summarizePullRequest", () => {
  it("flattens the fields shown in tables", () => {
    const pullRequest = pullRequestFixture();

    expect(summarizePullRequest({ pullRequest, evaluation: PARTIAL_EVALUATION })).toEqual({
      pullRequestId: "7",
      title: "Add feature",
      author: "alice",
      lastActivityDate: pullRequest.lastActivityDate,
      pullRequestStatus: "OPEN",
      approvalStatus: "1 of 2 rules satisfied",
      repositoryName: "service",
    });
  });
});

describe("describeApproval", () => {
  it("reports approval or rule progress", () => {
    const pullRequest = pullRequestFixture();

    expect(describeApproval({ pullRequest, evaluation: APPROVED_EVALUATION })).toBe("Approved");
    expect(describeApproval({ pullRequest })).toBe("0 of 0 rules satisfied");
  });
});

describe("requirePullRequestTarget", () => {
  it("returns the first target", () => {
    expect(requirePullRequestTarget({ pullRequest: pullRequestFixture() }).sourceCommit).toBe("src1");
  });

  it("fails without a target repository", () => {
    expect(() => requirePullRequestTarget({ pullRequest: pullRequestFixture({ pullRequestTargets: [] }) })).toThrow(
      "PR 7 has no target repository"
    );
  });
});

describe("toChangedFiles", () => {
  it("maps change types and blob ids", () => {
    expect(toChangedFiles(DIFFERENCES)).toEqual([
      { file: "src/app.ts", change: "modified", before: "b1", after: "b2" },
      { file: "docs/new.md", change: "added", before: undefined, after: "b3" },
      { file: "old.txt", change: "deleted", before: "b4", after: undefined },
      { file: "bundle.zip", change: "added", before: undefined, after: "b5" },
    ]);
  });

  it("skips differences without a path", () => {
    expect(toChangedFiles([{ changeType: "M" }])).toEqual([]);
  });
});

describe("isBinaryPath", () => {
  it("recognizes archive and office extensions", () => {
    expect(isBinaryPath("dist/bundle.zip")).toBe(true);
    expect(isBinaryPath("docs/notes.docx")).toBe(true);
    expect(isBinaryPath("src/app.ts")).toBe(false);
  });
});

describe("groupPullRequestComments", () => {
  it("separates general comments from source-side line comments", () => {
    const grouped = groupPullRequestComments(COMMENT_THREADS);

    expect(grouped.general).toEqual([{ author: "bob", comment: "Looks good" }]);
    expect([...grouped.byFile.keys()]).toEqual(["src/app.ts"]);
    expect(grouped.byFile.get("src/app.ts")?.get(2)).toEqual([{ author: "carol", comment: "typo" }]);
    expect(grouped.byFile.get("src/app.ts")?.has(1)).toBe(false);
  });

  it("merges threads on the same line", () => {
    const location = { filePath: "a.ts", filePosition: 3, relativeFileVersion: "AFTER" as const };
    const grouped = groupPullRequestComments([
      { location, comments: [{ authorArn: "arn:aws:iam::123456789012:user/bob", content: "one" }] },
      { location, comments: [{ authorArn: "arn:aws:iam::123456789012:user/carol", content: "two" }] },
      {
        location: { ...location, filePosition: 9 },
        comments: [{ authorArn: "arn:aws:iam::123456789012:user/erin", content: "three" }],
      },
    ]);

    expect(grouped.byFile.get("a.ts")?.get(3)).toHaveLength(2);
    expect(countCommentedLines(grouped.byFile.get("a.ts"))).toBe(2);
    expect(countCommentedLines(undefined)).toBe(0);
  });
});
