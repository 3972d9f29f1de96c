import type {
  CommentsForPullRequest,
  Difference,
  Evaluation,
  PullRequest,
} from "@aws-sdk/client-codecommit";
import type { CodeCommitApi } from "../src/core/api/services.js";
import { encode } from "./helpers.js";

export const NOW = new Date("2024-05-01T12:00:00Z");

export function pullRequestFixture(overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    pullRequestId: "7",
    title: "Add feature",
    authorArn: "arn:aws:iam::123456789012:user/alice",
    lastActivityDate: new Date(NOW.getTime() - 2 * 60 * 60 * 1000),
    pullRequestStatus: "OPEN",
    revisionId: "rev-7",
    pullRequestTargets: [
      {
        repositoryName: "service",
        sourceReference: "refs/heads/feature",
        destinationReference: "refs/heads/master",
        sourceCommit: "src1",
        destinationCommit: "dst1",
      },
    ],
    ...overrides,
  };
}

export const PARTIAL_EVALUATION: Evaluation = {
  approved: false,
  overridden: false,
  approvalRulesSatisfied: ["one approver"],
  approvalRulesNotSatisfied: ["team lead"],
};

export const APPROVED_EVALUATION: Evaluation = {
  approved: true,
  overridden: false,
  approvalRulesSatisfied: ["one approver", "team lead"],
  approvalRulesNotSatisfied: [],
};

export const DIFFERENCES: Difference[] = [
  {
    changeType: "M",
    beforeBlob: { path: "src/app.ts", blobId: "b1" },
    afterBlob: { path: "src/app.ts", blobId: "b2" },
  },
  { changeType: "A", afterBlob: { path: "docs/new.md", blobId: "b3" } },
  { changeType: "D", beforeBlob: { path: "old.txt", blobId: "b4" } },
  { changeType: "A", afterBlob: { path: "bundle.zip", blobId: "b5" } },
];

export const BLOBS: Record<string, string> = {
  b1: "a\nb\nc\n",
  b2: "a\nB\nc\n",
  b3: "hello\n",
  b4: "gone\n",
};

export const COMMENT_THREADS: CommentsForPullRequest[] = [
  {
    comments: [{ authorArn: "arn:aws:iam::123456789012:user/bob", content: "Looks good" }],
  },
  {
    location: { filePath: "src/app.ts", filePosition: 2, relativeFileVersion: "AFTER" },
    comments: [{ authorArn: "arn:aws:sts::123456789012:assumed-role/dev/carol", content: "typo" }],
  },
  {
    location: { filePath: "src/app.ts", filePosition: 1, relativeFileVersion: "BEFORE" },
    comments: [{ authorArn: "arn:aws:iam::123456789012:user/erin", content: "old side" }],
  },
];

/** CodeCommit fake serving one pull request, its differences and blobs. */
export function pullRequestApi(
  pullRequest: PullRequest = pullRequestFixture(),
  evaluation: Evaluation = PARTIAL_EVALUATION
): Partial<CodeCommitApi> {
  return {
    getPullRequest: async () => ({ $metadata: {}, pullRequest }),
    evaluatePullRequestApprovalRules: async () => ({ $metadata: {}, evaluation }),
    getDifferences: async () => ({ $metadata: {}, differences: DIFFERENCES }),
    getBlob: async (input) => ({ $metadata: {}, content: encode(BLOBS[input.blobId ?? ""] ?? "") }),
    getCommentsForPullRequest: async () => ({ $metadata: {}, commentsForPullRequestData: COMMENT_THREADS }),
  };
}
