import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Chalk } from "chalk";
import type { Command } from "commander";
import { AwsApiClient } from "../src/core/api/client.js";
import { ResponseCache } from "../src/core/api/cache.js";
import type { CodeCommitApi, CodePipelineApi } from "../src/core/api/services.js";
import { getDefaultConfig } from "../src/core/config/store.js";
import type { CcprConfig } from "../src/core/config/schema.js";
import { GitContext } from "../src/core/git/context.js";
import type { GitRunner } from "../src/core/git/context.js";
import { BufferWriter } from "../src/core/output/writer.js";
import type { CliRuntime } from "../src/core/utils/context.js";
import type { Prompter } from "../src/core/utils/prompt.js";
import { createProgram } from "../src/program.js";

export const TEST_REGION = "us-east-1";

export function tempDir(prefix = "ccpr-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

function unexpected(name: string): () => Promise<never> {
  return () => Promise.reject(new Error(`unexpected call: ${name}`));
}

export function fakeCodeCommit(overrides: Partial<CodeCommitApi> = {}): CodeCommitApi {
  return {
    listRepositories: overrides.listRepositories ?? unexpected("listRepositories"),
    listBranches: overrides.listBranches ?? unexpected("listBranches"),
    listPullRequests: overrides.listPullRequests ?? unexpected("listPullRequests"),
    getPullRequest: overrides.getPullRequest ?? unexpected("getPullRequest"),
    evaluatePullRequestApprovalRules:
      overrides.evaluatePullRequestApprovalRules ?? unexpected("evaluatePullRequestApprovalRules"),
    getDifferences: overrides.getDifferences ?? unexpected("getDifferences"),
    getBlob: overrides.getBlob ?? unexpected("getBlob"),
    getFolder: overrides.getFolder ?? unexpected("getFolder"),
    getCommentsForPullRequest: overrides.getCommentsForPullRequest ?? unexpected("getCommentsForPullRequest"),
    postCommentForPullRequest: overrides.postCommentForPullRequest ?? unexpected("postCommentForPullRequest"),
    createPullRequest: overrides.createPullRequest ?? unexpected("createPullRequest"),
    updatePullRequestApprovalState:
      overrides.updatePullRequestApprovalState ?? unexpected("updatePullRequestApprovalState"),
    updatePullRequestStatus: overrides.updatePullRequestStatus ?? unexpected("updatePullRequestStatus"),
    mergePullRequestByFastForward: overrides.mergePullRequestByFastForward ?? unexpected("mergePullRequestByFastForward"),
    mergePullRequestBySquash: overrides.mergePullRequestBySquash ?? unexpected("mergePullRequestBySquash"),
    mergePullRequestByThreeWay: overrides.mergePullRequestByThreeWay ?? unexpected("mergePullRequestByThreeWay"),
  };
}

export function fakeCodePipeline(overrides: Partial<CodePipelineApi> = {}): CodePipelineApi {
  return {
    getPipelineState: overrides.getPipelineState ?? unexpected("getPipelineState"),
    listActionExecutions: overrides.listActionExecutions ?? unexpected("listActionExecutions"),
  };
}

/** Answers known `git` invocations; anything else fails like git outside a repository. */
export function fakeGit(responses: Record<string, string>): GitRunner {
  return (args) => {
    const stdout = responses[args.join(" ")];
    if (stdout === undefined) {
      return { status: 128, stdout: "", stderr: "fatal: not a git repository" };
    }
    return { status: 0, stdout, stderr: "" };
  };
}

export function fakePrompt(answers: { ask?: string; confirm?: boolean } = {}): Prompter & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    ask: async (question, defaultValue) => {
      questions.push(question);
      return answers.ask ?? defaultValue ?? "";
    },
    confirm: async (question) => {
      questions.push(question);
      return answers.confirm ?? false;
    },
  };
}

export type TestRuntimeOptions = {
  codecommit?: Partial<CodeCommitApi>;
  codepipeline?: Partial<CodePipelineApi>;
  git?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
  config?: CcprConfig;
  prompt?: Prompter;
  now?: Date;
};

export type TestRuntime = {
  runtime: CliRuntime;
  out: BufferWriter;
  opened: string[];
};

export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const out = new BufferWriter();
  const opened: string[] = [];
  const env = options.env ?? { CCPR_REPO: "service" };
  const cacheDir = tempDir("ccpr-cache-");
  const config = options.config ?? getDefaultConfig();
  const now = options.now ?? new Date("2024-05-01T12:00:00Z");

  const runtime: CliRuntime = {
    env,
    out,
    colors: new Chalk({ level: 0 }),
    now: () => now,
    prompt: options.prompt ?? fakePrompt(),
    loadConfig: () => config,
    createClient: () =>
      new AwsApiClient(
        {
          codecommit: fakeCodeCommit(options.codecommit),
          codepipeline: fakeCodePipeline(options.codepipeline),
          region: async () => TEST_REGION,
        },
        new ResponseCache(cacheDir),
        0
      ),
    createGit: (loaded) => new GitContext(fakeGit(options.git ?? {}), env, loaded.defaults.repository),
    openUrl: (url) => {
      opened.push(url);
    },
  };
  return { runtime, out, opened };
}

export async function runCli(runtime: CliRuntime, args: string[]): Promise<void> {
  const program = createProgram(runtime);
  silence(program);
  await program.parseAsync(["node", "ccpr", ...args]);
}

function silence(command: Command): void {
  command.exitOverride();
  command.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  for (const sub of command.commands) {
    silence(sub);
  }
}

export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function outputLines(out: BufferWriter): string[] {
  return out.text().split("\n");
}
