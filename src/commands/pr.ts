import { Command } from "commander";
import type { PullRequestStatusEnum } from "@aws-sdk/client-codecommit";
import {
  approvePullRequest,
  closePullRequest,
  createPullRequest,
  getDifferences,
  getPullRequestDetail,
  listPullRequestComments,
  listPullRequestDetails,
  mergePullRequest,
  postPullRequestComment,
} from "../core/api/pr.js";
import type { PullRequestDetail } from "../core/api/pr.js";
import type { AwsApiClient } from "../core/api/client.js";
import { getBlobText, listRepositoryBranches } from "../core/api/repo.js";
import type { MergeStrategy } from "../core/config/schema.js";
import { computeLineDiff, DEFAULT_CONTEXT_LINES } from "../core/diff/lines.js";
import { renderCommentTable, renderDiffHeader, renderDiffRows } from "../core/diff/render.js";
import { CliError } from "../core/errors.js";
import { consoleUrl, formatLinkLine } from "../core/output/links.js";
import { assertRichOutputFileOption, emitStructuredOutput, normalizeRichOutputFormat } from "../core/output/rich.js";
import type { RichOutputFormat } from "../core/output/rich.js";
import { renderTable } from "../core/output/table.js";
import {
  countCommentedLines,
  groupPullRequestComments,
  isBinaryPath,
  PULL_REQUEST_COLORS,
  PULL_REQUEST_COLUMNS,
  requirePullRequestTarget,
  summarizePullRequest,
  toChangedFiles,
} from "../core/pr/summary.js";
import type { ChangedFile, PullRequestComments } from "../core/pr/summary.js";
import { openCommandContext } from "../core/utils/context.js";
import type { CliRuntime, CommandContext } from "../core/utils/context.js";
import { parseLineNumberOption, parseMergeStrategyOption } from "../core/utils/options.js";

type OutputOptions = {
  format?: string;
  out?: string;
  json?: boolean;
};

type PrsOptions = OutputOptions & {
  any?: boolean;
  closed?: boolean;
};

type PrViewOptions = OutputOptions & {
  diffs?: boolean;
  comments?: boolean;
  file?: string;
  web?: boolean;
};

type ShowOptions = {
  diffs?: boolean;
  comments?: boolean;
  file?: string;
};

export function registerPrCommands(program: Command, runtime: CliRuntime): void {
  program
    .command("prs")
    .alias("ls")
    .description("List pull requests of a repository (OPEN by default)")
    .argument("[repo]", "Repository name (defaults to the current repository)")
    .option("-a, --any", "Pull requests in any state", false)
    .option("-c, --closed", "Only CLOSED pull requests", false)
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write pull request list output to file")
    .option("--json", "Print raw JSON")
    .action(async (repo: string | undefined, options: PrsOptions) => {
      const format = normalizeRichOutputFormat(options.format, options.json);
      assertRichOutputFileOption(options.out, format);
      const ctx = openCommandContext(runtime);
      const repositoryName = ctx.git.requireRepository(repo);

      let status: PullRequestStatusEnum | undefined = "OPEN";
      if (options.closed) {
        status = "CLOSED";
      } else if (options.any) {
        status = undefined;
      }

      const details = await listPullRequestDetails(ctx.client, { repositoryName, status });
      if (details.length === 0) {
        throw new CliError(`no PRs with ${status ?? "any"} state in repo ${repositoryName}`);
      }
      const rows = details.map(summarizePullRequest);
      if (emitStructuredOutput(ctx.out, rows, { format, out: options.out, label: "pull request list" })) {
        return;
      }
      ctx.out.write(
        renderTable(rows, PULL_REQUEST_COLUMNS, {
          colors: ctx.colors,
          colorize: PULL_REQUEST_COLORS,
          timeAgo: ["activity"],
          now: ctx.now,
        })
      );
    });

  program
    .command("pr")
    .alias("id")
    .description("Show a pull request with its changed files, diffs and comments")
    .argument("<id>", "Pull request ID")
    .option("-d, --diffs", "Show colorized diffs", false)
    .option("-c, --comments", "Show comments (implies --diffs)", false)
    .option("-f, --file <pattern>", "Only diffs of files matching the pattern (implies --diffs)")
    .option("--web", "Open the pull request in the console", false)
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write pull request output to file")
    .option("--json", "Print raw JSON")
    .action(async (id: string, options: PrViewOptions) => {
      const format = normalizeRichOutputFormat(options.format, options.json);
      assertRichOutputFileOption(options.out, format);
      const ctx = openCommandContext(runtime);

      if (format !== "table") {
        await emitPullRequestData(ctx, id, format, options);
        return;
      }

      const detail = await showPullRequest(ctx, id, options);
      if (options.web) {
        const { repositoryName } = requirePullRequestTarget(detail);
        ctx.openUrl(consoleUrl(await ctx.client.region(), pullRequestConsolePath(repositoryName, id, "details")));
      }
    });

  program
    .command("approve")
    .alias("a")
    .description("Approve a pull request")
    .argument("<id>", "Pull request ID")
    .action(async (id: string) => {
      const ctx = openCommandContext(runtime);
      const detail = await showPullRequest(ctx, id);
      const { pullRequest } = detail;
      if (pullRequest.pullRequestStatus === "CLOSED") {
        throw new CliError("PR already closed, unable to approve");
      }
      if (!pullRequest.revisionId) {
        throw new CliError(`PR ${id} has no revision to approve`);
      }
      await approvePullRequest(ctx.client, { pullRequestId: id, revisionId: pullRequest.revisionId });
      ctx.out.write(`${ctx.colors.bold.green("PR approved")}\n`);
    });

  program
    .command("close")
    .alias("x")
    .description("Close a pull request")
    .argument("<id>", "Pull request ID")
    .option("-y, --yes", "Skip the confirmation prompt", false)
    .action(async (id: string, options: { yes?: boolean }) => {
      const ctx = openCommandContext(runtime);
      const detail = await showPullRequest(ctx, id);
      if (detail.pullRequest.pullRequestStatus === "CLOSED") {
        throw new CliError("PR already closed");
      }
      if (!options.yes && !(await ctx.prompt.confirm("Confirm?"))) {
        return;
      }
      await closePullRequest(ctx.client, { pullRequestId: id });
      ctx.out.write(`${ctx.colors.cyan("PR closed")}\n`);
    });

  program
    .command("merge")
    .alias("m")
    .description("Merge an approved pull request")
    .argument("<id>", "Pull request ID")
    .option("-s, --strategy <strategy>", "fast_forward | squash | three_way", parseMergeStrategyOption)
    .action(async (id: string, options: { strategy?: MergeStrategy }) => {
      const ctx = openCommandContext(runtime);
      const detail = await showPullRequest(ctx, id);
      if (detail.pullRequest.pullRequestStatus === "CLOSED") {
        throw new CliError("PR already closed");
      }
      if (detail.evaluation?.approved !== true) {
        throw new CliError("PR not approved");
      }
      const { repositoryName } = requirePullRequestTarget(detail);
      await mergePullRequest(ctx.client, {
        pullRequestId: id,
        repositoryName,
        strategy: options.strategy ?? ctx.config.defaults.mergeStrategy,
      });
      ctx.out.write(`${ctx.colors.cyan("PR merged")}\n`);
    });

  program
    .command("create")
    .alias("c")
    .description("Create a pull request from the current branch")
    .argument("[repo]", "Repository name (defaults to the current repository)")
    .option("-t, --title <title>", "Title (defaults to a prompt prefilled with the last commit message)")
    .option("-b, --branch <branch>", "Source branch (defaults to the current branch)")
    .action(async (repo: string | undefined, options: { title?: string; branch?: string }) => {
      const ctx = openCommandContext(runtime);
      const repositoryName = ctx.git.requireRepository(repo);
      const branch = options.branch ?? ctx.git.currentBranch();

      const branches = await listRepositoryBranches(ctx.client, { repositoryName });
      if (!branches.includes(branch)) {
        throw new CliError(`current branch ${branch} not in repo ${repositoryName}`);
      }

      const title = options.title ?? (await ctx.prompt.ask("Enter PR title", ctx.git.lastCommitMessage()));
      if (!title.trim()) {
        throw new CliError("PR title must not be empty");
      }

      const pullRequest = await createPullRequest(ctx.client, {
        repositoryName,
        sourceReference: branch,
        title,
      });
      const pullRequestId = pullRequest.pullRequestId ?? "";
      ctx.out.write(`${ctx.colors.cyan(`created PR ${ctx.colors.bold(pullRequestId)}`)}\n`);
      const url = consoleUrl(await ctx.client.region(), pullRequestConsolePath(repositoryName, pullRequestId, "changes"));
      ctx.out.write(formatLinkLine(ctx.colors, url));
    });

  program
    .command("comment")
    .alias("C")
    .description("Comment on a pull request; on a file line when --file and --lineno are given")
    .argument("<id>", "Pull request ID")
    .argument("<content>", "Comment text")
    .option("-f, --file <path>", "Changed file to comment on")
    .option("-l, --lineno <number>", "Line of the file (source version)", parseLineNumberOption)
    .action(async (id: string, content: string, options: { file?: string; lineno?: number }) => {
      if ((options.file === undefined) !== (options.lineno === undefined)) {
        throw new CliError("--lineno required with --file");
      }
      const ctx = openCommandContext(runtime);
      const detail = await getPullRequestDetail(ctx.client, { pullRequestId: id });
      const target = requirePullRequestTarget(detail);
      if (!target.sourceCommit) {
        throw new CliError(`PR ${id} has no source commit`);
      }

      let location: { filePath: string; filePosition: number } | undefined;
      if (options.file !== undefined && options.lineno !== undefined) {
        const files = await listPullRequestFilePaths(ctx.client, detail);
        if (!files.includes(options.file)) {
          const listing = files.map((file, index) => `${index + 1}] ${file}`).join("\n");
          throw new CliError(`file '${options.file}' not in list of PR files:\n${listing}`);
        }
        location = { filePath: options.file, filePosition: options.lineno };
      }

      await postPullRequestComment(ctx.client, {
        pullRequestId: id,
        repositoryName: target.repositoryName,
        beforeCommitId: target.destinationCommit,
        afterCommitId: target.sourceCommit,
        content,
        location,
      });
      ctx.out.write(`${ctx.colors.cyan(location ? "file comment added" : "general comment added")}\n`);
    });
}

export function pullRequestConsolePath(repositoryName: string, pullRequestId: string, tab: "changes" | "details"): string {
  return `/codecommit/repositories/${repositoryName}/pull-requests/${pullRequestId}/${tab}`;
}

/**
 * Prints the pull request summary, then its changed files or diffs.
 * Returns the fetched detail so that state-changing commands can check it.
 */
export async function showPullRequest(
  ctx: CommandContext,
  id: string,
  options: ShowOptions = {}
): Promise<PullRequestDetail> {
  const { colors, out } = ctx;
  const detail = await getPullRequestDetail(ctx.client, { pullRequestId: id });
  const target = requirePullRequestTarget(detail);
  if (target.repositoryName !== ctx.git.currentRepository()) {
    out.write(`repo: ${colors.bold.red(target.repositoryName)}\n`);
  }
  out.write(
    renderTable(summarizePullRequest(detail), PULL_REQUEST_COLUMNS, {
      colors,
      colorize: PULL_REQUEST_COLORS,
      timeAgo: ["activity"],
      now: ctx.now,
    })
  );

  const files = await listChangedFiles(ctx, detail);
  const showDiffs = Boolean(options.diffs || options.comments || options.file !== undefined);
  if (!showDiffs) {
    out.write(
      renderTable(files, ["file", "change"], {
        colors,
        title: "changes:",
        counter: true,
        colorize: { change: ["deleted=red", ".*=green"] },
      })
    );
    return detail;
  }

  let comments: PullRequestComments = { general: [], byFile: new Map() };
  if (options.comments) {
    comments = groupPullRequestComments(await listPullRequestComments(ctx.client, { pullRequestId: id }));
    if (comments.general.length > 0) {
      out.write(renderCommentTable(comments.general, colors, "PR comments"));
    }
  }

  const filter = options.file !== undefined ? new RegExp(options.file) : undefined;
  let matches = 0;
  for (const file of files) {
    if (isBinaryPath(file.file)) {
      out.write(`${colors.bold.white(`${file.file} (binary)`)}\n`);
      continue;
    }
    if (filter && !filter.test(file.file)) {
      continue;
    }
    matches += 1;
    await writeFileDiff(ctx, target.repositoryName, file, comments, filter !== undefined);
  }
  if (filter && matches === 0) {
    throw new CliError(`no files matching pattern '${options.file ?? ""}' in PR`);
  }
  return detail;
}

/** Source-side paths of the files a pull request changes. */
export async function listPullRequestFilePaths(client: AwsApiClient, detail: PullRequestDetail): Promise<string[]> {
  const target = requirePullRequestTarget(detail);
  if (!target.sourceCommit) {
    return [];
  }
  const differences = await getDifferences(client, {
    repositoryName: target.repositoryName,
    beforeCommitSpecifier: target.destinationCommit,
    afterCommitSpecifier: target.sourceCommit,
  });
  return differences
    .map((difference) => difference.afterBlob?.path)
    .filter((value): value is string => Boolean(value));
}

async function listChangedFiles(ctx: CommandContext, detail: PullRequestDetail): Promise<ChangedFile[]> {
  const target = requirePullRequestTarget(detail);
  if (!target.sourceCommit) {
    return [];
  }
  const differences = await getDifferences(ctx.client, {
    repositoryName: target.repositoryName,
    beforeCommitSpecifier: target.destinationCommit,
    afterCommitSpecifier: target.sourceCommit,
  });
  return toChangedFiles(differences);
}

/**
 * Added and deleted files get a marker line; an added file is shown in full
 * only when files were selected with `--file`.
 */
async function writeFileDiff(
  ctx: CommandContext,
  repositoryName: string,
  file: ChangedFile,
  comments: PullRequestComments,
  selected: boolean
): Promise<void> {
  const lineComments = comments.byFile.get(file.file);
  const commentCount = countCommentedLines(lineComments);
  const modified = file.before !== undefined && file.after !== undefined;

  if (!modified) {
    ctx.out.write(renderDiffHeader(file.file, ctx.colors, { change: file.after === undefined ? "deleted" : "added", commentCount }));
  }
  if (!modified && !(selected && file.after !== undefined)) {
    return;
  }

  const [before, after] = await Promise.all([
    readBlob(ctx, repositoryName, file.before),
    readBlob(ctx, repositoryName, file.after),
  ]);
  if (modified) {
    ctx.out.write(renderDiffHeader(file.file, ctx.colors, { change: "modified", commentCount }));
  }
  const rows = computeLineDiff(before, after, DEFAULT_CONTEXT_LINES);
  ctx.out.write(renderDiffRows(rows, { colors: ctx.colors, comments: lineComments }));
}

function readBlob(ctx: CommandContext, repositoryName: string, blobId: string | undefined): Promise<string> {
  if (!blobId) {
    return Promise.resolve("");
  }
  return getBlobText(ctx.client, { repositoryName, blobId, cacheSecs: 0 });
}

async function emitPullRequestData(
  ctx: CommandContext,
  id: string,
  format: Exclude<RichOutputFormat, "table">,
  options: PrViewOptions
): Promise<void> {
  const detail = await getPullRequestDetail(ctx.client, { pullRequestId: id });
  const files = await listChangedFiles(ctx, detail);
  const payload: Record<string, unknown> = {
    ...summarizePullRequest(detail),
    files,
  };
  if (options.comments) {
    const comments = groupPullRequestComments(await listPullRequestComments(ctx.client, { pullRequestId: id }));
    payload.comments = comments.general;
    payload.fileComments = [...comments.byFile.entries()].flatMap(([filePath, lines]) =>
      [...lines.entries()].flatMap(([line, items]) => items.map((item) => ({ file: filePath, line, ...item })))
    );
  }
  emitStructuredOutput(ctx.out, payload, { format, out: options.out, label: "pull request" });
}
