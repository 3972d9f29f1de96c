import { spawnSync } from "node:child_process";
import path from "node:path";
import { CliError } from "../errors.js";

export type GitResult = {
  status: number | null;
  stdout: string;
  stderr: string;
};

export type GitRunner = (args: string[]) => GitResult;

export const spawnGit: GitRunner = (args) => {
  const result = spawnSync("git", args, {
    encoding: "utf-8",
  });
  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
  };
};

const MAIN_BRANCHES = ["main", "master"];

/**
 * Implicit context taken from the local working directory: which CodeCommit
 * repository we are in, and which branch is checked out.
 */
export class GitContext {
  constructor(
    private readonly run: GitRunner = spawnGit,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly fallbackRepository?: string
  ) {}

  topLevel(): string | undefined {
    const result = this.run(["rev-parse", "--show-toplevel"]);
    if (result.status !== 0) {
      return undefined;
    }
    const dir = result.stdout.trim();
    return dir || undefined;
  }

  currentRepository(): string | undefined {
    const override = this.env.CCPR_REPO?.trim();
    if (override) {
      return override;
    }
    const topLevel = this.topLevel();
    if (topLevel) {
      return path.basename(topLevel);
    }
    return this.fallbackRepository;
  }

  requireRepository(provided?: string): string {
    const repository = provided ?? this.currentRepository();
    if (!repository) {
      throw new CliError("Missing repository. Pass a repo name, run inside a git repository or set CCPR_REPO.");
    }
    return repository;
  }

  currentBranch(options: { mainOk?: boolean } = {}): string {
    const topLevel = this.topLevel();
    if (!topLevel) {
      throw new CliError("must be in a repo directory");
    }
    const result = this.run(["symbolic-ref", "--quiet", "--short", "HEAD"]);
    const branch = result.status === 0 ? result.stdout.trim() : "";
    if (!branch) {
      throw new CliError(`no branch found in repo ${path.basename(topLevel)}`);
    }
    if (!options.mainOk && MAIN_BRANCHES.includes(branch)) {
      throw new CliError("branch must not be main or master");
    }
    return branch;
  }

  lastCommitMessage(): string | undefined {
    const result = this.run(["log", "-1", "--format=%s"]);
    if (result.status !== 0) {
      return undefined;
    }
    const message = result.stdout.trim();
    return message || undefined;
  }
}
