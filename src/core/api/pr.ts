import type {
  CommentsForPullRequest,
  Difference,
  Evaluation,
  PullRequest,
  PullRequestStatusEnum,
} from "@aws-sdk/client-codecommit";
import type { AwsApiClient } from "./client.js";
import type { MergeStrategy } from "../config/schema.js";
import { CliError } from "../errors.js";

export type PullRequestDetail = {
  pullRequest: PullRequest;
  evaluation?: Evaluation;
};

export async function listPullRequestIds(client: AwsApiClient, input: {
  repositoryName: string;
  status?: PullRequestStatusEnum;
}): Promise<string[]> {
  const ids: string[] = [];
  let nextToken: string | undefined;
  do {
    const output = await client.call(
      "list_pull_requests",
      { repositoryName: input.repositoryName, pullRequestStatus: input.status, nextToken },
      (request) => client.codecommit.listPullRequests(request)
    );
    ids.push(...(output.pullRequestIds ?? []));
    nextToken = output.nextToken;
  } while (nextToken);
  return ids;
}

export async function getPullRequest(client: AwsApiClient, input: {
  pullRequestId: string;
  cacheSecs?: number;
}): Promise<PullRequest> {
  const output = await client.call(
    "get_pull_request",
    { pullRequestId: input.pullRequestId },
    (request) => client.codecommit.getPullRequest(request),
    { cacheSecs: input.cacheSecs }
  );
  if (!output.pullRequest) {
    throw new CliError(`PR ${input.pullRequestId} not found`);
  }
  return output.pullRequest;
}

export async function evaluatePullRequestApprovalRules(client: AwsApiClient, input: {
  pullRequestId: string;
  revisionId: string;
  cacheSecs?: number;
}): Promise<Evaluation | undefined> {
  const output = await client.call(
    "evaluate_pull_request_approval_rules",
    { pullRequestId: input.pullRequestId, revisionId: input.revisionId },
    (request) => client.codecommit.evaluatePullRequestApprovalRules(request),
    { cacheSecs: input.cacheSecs }
  );
  return output.evaluation;
}

/** Pull request joined with the evaluation of its approval rules for the current revision. */
export async function getPullRequestDetail(client: AwsApiClient, input: {
  pullRequestId: string;
  cacheSecs?: number;
}): Promise<PullRequestDetail> {
  const pullRequest = await getPullRequest(client, input);
  if (!pullRequest.revisionId) {
    return { pullRequest };
  }
  const evaluation = await evaluatePullRequestApprovalRules(client, {
    pullRequestId: input.pullRequestId,
    revisionId: pullRequest.revisionId,
    cacheSecs: input.cacheSecs,
  });
  return { pullRequest, evaluation };
}

export async function listPullRequestDetails(client: AwsApiClient, input: {
  repositoryName: string;
  status?: PullRequestStatusEnum;
}): Promise<PullRequestDetail[]> {
  const ids = await listPullRequestIds(client, input);
  return client.join(ids, (pullRequestId) => getPullRequestDetail(client, { pullRequestId }));
}

export async function getDifferences(client: AwsApiClient, input: {
  repositoryName: string;
  beforeCommitSpecifier?: string;
  afterCommitSpecifier: string;
}): Promise<Difference[]> {
  const differences: Difference[] = [];
  let nextToken: string | undefined;
  do {
    const output = await client.call(
      "get_differences",
      {
        repositoryName: input.repositoryName,
        beforeCommitSpecifier: input.beforeCommitSpecifier,
        afterCommitSpecifier: input.afterCommitSpecifier,
        NextToken: nextToken,
      },
      (request) => client.codecommit.getDifferences(request)
    );
    differences.push(...(output.differences ?? []));
    nextToken = output.NextToken;
  } while (nextToken);
  return differences;
}

export async function listPullRequestComments(client: AwsApiClient, input: {
  pullRequestId: string;
}): Promise<CommentsForPullRequest[]> {
  const threads: CommentsForPullRequest[] = [];
  let nextToken: string | undefined;
  do {
    const output = await client.call(
      "get_comments_for_pull_request",
      { pullRequestId: input.pullRequestId, nextToken },
      (request) => client.codecommit.getCommentsForPullRequest(request)
    );
    threads.push(...(output.commentsForPullRequestData ?? []));
    nextToken = output.nextToken;
  } while (nextToken);
  return threads;
}

export async function approvePullRequest(client: AwsApiClient, input: {
  pullRequestId: string;
  revisionId: string;
}): Promise<void> {
  await client.call(
    "update_pull_request_approval_state",
    { pullRequestId: input.pullRequestId, revisionId: input.revisionId, approvalState: "APPROVE" as const },
    (request) => client.codecommit.updatePullRequestApprovalState(request),
    { cacheSecs: 0 }
  );
}

export async function closePullRequest(client: AwsApiClient, input: {
  pullRequestId: string;
}): Promise<PullRequest | undefined> {
  const output = await client.call(
    "update_pull_request_status",
    { pullRequestId: input.pullRequestId, pullRequestStatus: "CLOSED" as const },
    (request) => client.codecommit.updatePullRequestStatus(request),
    { cacheSecs: 0 }
  );
  return output.pullRequest;
}

export async function mergePullRequest(client: AwsApiClient, input: {
  pullRequestId: string;
  repositoryName: string;
  strategy: MergeStrategy;
}): Promise<PullRequest | undefined> {
  const request = { pullRequestId: input.pullRequestId, repositoryName: input.repositoryName };
  const operation = `merge_pull_request_by_${input.strategy}`;
  switch (input.strategy) {
    case "fast_forward": {
      const output = await client.call(operation, request, (value) => client.codecommit.mergePullRequestByFastForward(value), {
        cacheSecs: 0,
      });
      return output.pullRequest;
    }
    case "three_way": {
      const output = await client.call(operation, request, (value) => client.codecommit.mergePullRequestByThreeWay(value), {
        cacheSecs: 0,
      });
      return output.pullRequest;
    }
    case "squash": {
      const output = await client.call(operation, request, (value) => client.codecommit.mergePullRequestBySquash(value), {
        cacheSecs: 0,
      });
      return output.pullRequest;
    }
  }
}

export async function createPullRequest(client: AwsApiClient, input: {
  repositoryName: string;
  sourceReference: string;
  title: string;
  description?: string;
}): Promise<PullRequest> {
  const output = await client.call(
    "create_pull_request",
    {
      title: input.title,
      description: input.description,
      targets: [{ repositoryName: input.repositoryName, sourceReference: input.sourceReference }],
    },
    (request) => client.codecommit.createPullRequest(request),
    { cacheSecs: 0 }
  );
  if (!output.pullRequest) {
    throw new CliError("CreatePullRequest returned no pull request.");
  }
  return output.pullRequest;
}

export async function postPullRequestComment(client: AwsApiClient, input: {
  pullRequestId: string;
  repositoryName: string;
  beforeCommitId?: string;
  afterCommitId: string;
  content: string;
  location?: {
    filePath: string;
    filePosition: number;
  };
}): Promise<void> {
  await client.call(
    "post_comment_for_pull_request",
    {
      pullRequestId: input.pullRequestId,
      repositoryName: input.repositoryName,
      beforeCommitId: input.beforeCommitId,
      afterCommitId: input.afterCommitId,
      content: input.content,
      location: input.location
        ? { ...input.location, relativeFileVersion: "AFTER" as const }
        : undefined,
    },
    (request) => client.codecommit.postCommentForPullRequest(request),
    { cacheSecs: 0 }
  );
}
