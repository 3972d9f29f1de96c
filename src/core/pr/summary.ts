import path from "node:path";
import type { CommentsForPullRequest, Difference, PullRequestTarget } from "@aws-sdk/client-codecommit";
import type { PullRequestDetail } from "../api/pr.js";
import { CliError } from "../errors.js";
import type { FileChange, InlineComment, LineComments } from "../diff/render.js";
import { nameFromArn } from "../utils/records.js";

export type PullRequestRow = {
  pullRequestId: string;
  title: string;
  author: string;
  lastActivityDate?: Date;
  pullRequestStatus: string;
  approvalStatus: string;
  repositoryName?: string;
};

export type ChangedFile = {
  file: string;
  change: FileChange;
  before?: string;
  after?: string;
};

export type PullRequestComments = {
  general: InlineComment[];
  byFile: Map<string, LineComments>;
};

export const PULL_REQUEST_COLUMNS = [
  "id=pullRequestId",
  "title",
  "author",
  "activity=lastActivityDate",
  "status=pullRequestStatus",
  "approvals=approvalStatus",
];

export const PULL_REQUEST_COLORS = {
  approvals: ["Approved=cyan", ".*=red"],
};

export const BINARY_EXTENSIONS = [".zip", ".docx", ".pptx"];

const CHANGE_KINDS: Record<string, FileChange> = {
  A: "added",
  D: "deleted",
  M: "modified",
};

export function summarizePullRequest(detail: PullRequestDetail): PullRequestRow {
  const { pullRequest } = detail;
  return {
    pullRequestId: pullRequest.pullRequestId ?? "",
    title: pullRequest.title ?? "",
    author: nameFromArn(pullRequest.authorArn),
    lastActivityDate: pullRequest.lastActivityDate,
    pullRequestStatus: pullRequest.pullRequestStatus ?? "",
    approvalStatus: describeApproval(detail),
    repositoryName: pullRequest.pullRequestTargets?.[0]?.repositoryName,
  };
}

/** `Approved`, or how many approval rules are satisfied so far. */
export function describeApproval(detail: PullRequestDetail): string {
  const { evaluation } = detail;
  if (evaluation?.approved) {
    return "Approved";
  }
  const satisfied = evaluation?.approvalRulesSatisfied?.length ?? 0;
  const notSatisfied = evaluation?.approvalRulesNotSatisfied?.length ?? 0;
  return `${satisfied} of ${satisfied + notSatisfied} rules satisfied`;
}

/** First target of the pull request; every CodeCommit pull request has exactly one. */
export function requirePullRequestTarget(detail: PullRequestDetail): PullRequestTarget & { repositoryName: string } {
  const target = detail.pullRequest.pullRequestTargets?.[0];
  const repositoryName = target?.repositoryName;
  if (!target || !repositoryName) {
    throw new CliError(`PR ${detail.pullRequest.pullRequestId ?? ""} has no target repository`);
  }
  return { ...target, repositoryName };
}

export function toChangedFiles(differences: Difference[]): ChangedFile[] {
  const files: ChangedFile[] = [];
  for (const difference of differences) {
    const file = difference.afterBlob?.path ?? difference.beforeBlob?.path;
    if (!file) {
      continue;
    }
    files.push({
      file,
      change: CHANGE_KINDS[difference.changeType ?? "M"] ?? "modified",
      before: difference.beforeBlob?.blobId,
      after: difference.afterBlob?.blobId,
    });
  }
  return files;
}

export function isBinaryPath(file: string): boolean {
  return BINARY_EXTENSIONS.includes(path.extname(file));
}

/**
 * Splits comment threads into general comments and comments anchored to a
 * line of the source (AFTER) version of a file.
 */
export function groupPullRequestComments(threads: CommentsForPullRequest[]): PullRequestComments {
  const general: InlineComment[] = [];
  const byFile = new Map<string, LineComments>();

  for (const thread of threads) {
    const comments = (thread.comments ?? []).map((comment) => ({
      author: nameFromArn(comment.authorArn),
      comment: comment.content ?? "",
    }));
    const location = thread.location;
    if (!location) {
      general.push(...comments);
      continue;
    }
    if (location.relativeFileVersion !== "AFTER" || !location.filePath || location.filePosition === undefined) {
      continue;
    }
    const lines = byFile.get(location.filePath) ?? new Map<number, InlineComment[]>();
    lines.set(location.filePosition, [...(lines.get(location.filePosition) ?? []), ...comments]);
    byFile.set(location.filePath, lines);
  }

  return { general, byFile };
}

/** Number of commented lines; several comments on one line count once. */
export function countCommentedLines(lines: LineComments | undefined): number {
  return lines?.size ?? 0;
}
