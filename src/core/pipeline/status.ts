import type { ActionExecutionDetail, StageState } from "@aws-sdk/client-codepipeline";
import { nameFromArn } from "../utils/records.js";

export type Revision = {
  id: string;
  url?: string;
  summary?: string;
  updated?: Date;
};

export type ApprovalState = "InProgress" | "Rejected";

export type StageStatus = {
  stage: string;
  status?: string;
  updated?: Date;
  /** Latest action summary with approver ARNs shortened to user names. */
  summary: string;
  approvedBy: string[];
  approval?: ApprovalState;
  errorMessage?: string;
  errorUrl?: string;
  executionId?: string;
  commit?: Revision;
  /** Set once a stage runs an older source commit than the stage before it. */
  stale: boolean;
};

export type CommitHistoryEntry = {
  executionId: string;
  commit: Revision;
  build?: Revision;
};

export type PipelineStatus = {
  name: string;
  stages: StageStatus[];
  commits: CommitHistoryEntry[];
};

const APPROVED_BY_PATTERN = /Approved by (arn:aws:\S+)/g;
const MANUAL_APPROVAL = "AWS Approval Manual";

/** Pipeline execution ids referenced by the latest execution of each stage. */
export function listExecutionIds(states: StageState[]): string[] {
  const ids = new Set<string>();
  for (const state of states) {
    const id = state.latestExecution?.pipelineExecutionId;
    if (id) {
      ids.add(id);
    }
  }
  return [...ids];
}

export function summarizePipeline(
  name: string,
  states: StageState[],
  executions: ActionExecutionDetail[]
): PipelineStatus {
  const actionTypes = new Map<string, string>();
  const sources = new Map<string, Revision>();
  const builds = new Map<string, Revision>();

  for (const execution of executions) {
    const executionId = execution.pipelineExecutionId;
    if (!executionId) {
      continue;
    }
    const type = execution.input?.actionTypeId;
    actionTypes.set(
      actionKey(executionId, execution.stageName, execution.actionName),
      [type?.owner, type?.category, type?.provider].filter(Boolean).join(" ")
    );
    const revision = toRevision(execution);
    if (!revision) {
      continue;
    }
    if (type?.category === "Source") {
      sources.set(executionId, revision);
    } else if (type?.category === "Build") {
      builds.set(executionId, revision);
    }
  }

  let stale = false;
  let lastCommit: string | undefined;
  const stages = states.map((state): StageStatus => {
    const action = state.actionStates?.[0];
    const latest = action?.latestExecution;
    const executionId = state.latestExecution?.pipelineExecutionId;
    const status = state.latestExecution?.status;
    const { summary, approvedBy } = shortenApprovers(latest?.summary ?? "");

    let approval: ApprovalState | undefined;
    if (
      (status === "InProgress" || status === "Failed") &&
      executionId &&
      actionTypes.get(actionKey(executionId, state.stageName, action?.actionName)) === MANUAL_APPROVAL
    ) {
      approval = status === "InProgress" ? "InProgress" : "Rejected";
    }

    const commit = executionId ? sources.get(executionId) : undefined;
    if (commit) {
      if (lastCommit !== undefined && commit.id !== lastCommit) {
        stale = true;
      }
      lastCommit = commit.id;
    }

    return {
      stage: state.stageName ?? "",
      status,
      updated: latest?.lastStatusChange,
      summary,
      approvedBy,
      approval,
      errorMessage: latest?.errorDetails?.message,
      errorUrl: latest?.externalExecutionUrl,
      executionId,
      commit,
      stale,
    };
  });

  const commits = [...sources.entries()].map(([executionId, commit]) => ({
    executionId,
    commit,
    build: builds.get(executionId),
  }));

  return { name, stages, commits };
}

export function shortRevisionId(revision: Revision): string {
  return `#${revision.id.slice(-8)}`;
}

function shortenApprovers(summary: string): { summary: string; approvedBy: string[] } {
  const approvedBy: string[] = [];
  const shortened = summary.trim().replace(APPROVED_BY_PATTERN, (_match, arn: string) => {
    const user = nameFromArn(arn);
    approvedBy.push(user);
    return `Approved by ${user}`;
  });
  return { summary: shortened, approvedBy };
}

function toRevision(execution: ActionExecutionDetail): Revision | undefined {
  const result = execution.output?.executionResult;
  if (!result?.externalExecutionId) {
    return undefined;
  }
  return {
    id: result.externalExecutionId,
    url: result.externalExecutionUrl,
    summary: result.externalExecutionSummary,
    updated: execution.lastUpdateTime,
  };
}

function actionKey(executionId: string, stage: string | undefined, action: string | undefined): string {
  return `${executionId}\u0000${stage ?? ""}\u0000${action ?? ""}`;
}
