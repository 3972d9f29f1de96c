import { Command } from "commander";
import type { ChalkInstance } from "chalk";
import { getPipelineStageStates, listPipelineActionExecutions } from "../core/api/pipeline.js";
import { consoleUrl, formatLinkLine, hyperlink } from "../core/output/links.js";
import { assertRichOutputFileOption, emitStructuredOutput, normalizeRichOutputFormat } from "../core/output/rich.js";
import { DIM_FLAG, renderTable } from "../core/output/table.js";
import { listExecutionIds, shortRevisionId, summarizePipeline } from "../core/pipeline/status.js";
import type { PipelineStatus, Revision, StageStatus } from "../core/pipeline/status.js";
import { openCommandContext } from "../core/utils/context.js";
import type { CliRuntime } from "../core/utils/context.js";

type PipelineOptions = {
  branch?: string;
  name?: string;
  master?: boolean;
  commits?: boolean;
  absolute?: boolean;
  web?: boolean;
  format?: string;
  out?: string;
  json?: boolean;
};

export function registerPipelineCommand(program: Command, runtime: CliRuntime): void {
  program
    .command("pipeline")
    .alias("p")
    .description("Show CodePipeline stage status for a repository branch")
    .argument("[repo]", "Repository name (defaults to the current repository)")
    .option("-b, --branch <branch>", "Branch (defaults to the current branch)")
    .option("-n, --name <name>", "Pipeline name (defaults to <repo>_<branch>)")
    .option("-m, --master", "Use the main branch (defaults.mainBranch)", false)
    .option("-c, --commits", "Show commit and build history", false)
    .option("-a, --absolute", "Show absolute timestamps", false)
    .option("--web", "Open the pipeline in the console", false)
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write pipeline output to file")
    .option("--json", "Print raw JSON")
    .action(async (repo: string | undefined, options: PipelineOptions) => {
      const format = normalizeRichOutputFormat(options.format, options.json);
      assertRichOutputFileOption(options.out, format);
      const ctx = openCommandContext(runtime);

      const name = options.name ?? resolvePipelineName();
      const states = await getPipelineStageStates(ctx.client, { pipelineName: name });
      const executionGroups = await ctx.client.join(listExecutionIds(states), (pipelineExecutionId) =>
        listPipelineActionExecutions(ctx.client, { pipelineName: name, pipelineExecutionId })
      );
      const status = summarizePipeline(name, states, executionGroups.flat());

      if (emitStructuredOutput(ctx.out, status, { format, out: options.out, label: "pipeline" })) {
        return;
      }

      const region = await ctx.client.region();
      const url = consoleUrl(region, pipelineConsolePath(name));
      if (options.web) {
        ctx.openUrl(url);
      }
      ctx.out.write(formatLinkLine(ctx.colors, url));
      ctx.out.write(
        renderPipelineStatus(status, {
          colors: ctx.colors,
          region,
          absolute: Boolean(options.absolute),
          commits: Boolean(options.commits),
          now: ctx.now,
        })
      );

      function resolvePipelineName(): string {
        const repositoryName = ctx.git.requireRepository(repo);
        const branch = options.master
          ? ctx.config.defaults.mainBranch
          : options.branch ?? ctx.git.currentBranch({ mainOk: true });
        return `${repositoryName}_${branch}`;
      }
    });
}

export function pipelineConsolePath(name: string): string {
  return `/codepipeline/pipelines/${name}/view`;
}

export type PipelineRenderOptions = {
  colors: ChalkInstance;
  region: string;
  absolute: boolean;
  commits: boolean;
  now: Date;
};

export function renderPipelineStatus(status: PipelineStatus, options: PipelineRenderOptions): string {
  const { colors } = options;
  const timeAgo = options.absolute ? [] : ["updated"];
  const rows = status.stages.map((stage) => ({
    stage: stage.stage,
    status: stage.status,
    updated: stage.updated,
    commit: stage.commit ? revisionLink(colors, options.region, stage.commit) : "",
    summary: formatStageSummary(colors, stage),
    error: stage.errorMessage
      ? hyperlink(colors, consoleUrl(options.region, stage.errorUrl ?? pipelineConsolePath(status.name)), stage.errorMessage)
      : "",
    [DIM_FLAG]: stage.stale,
  }));

  const columns = ["stage", "status", "updated", "commit", "summary"];
  if (status.stages.some((stage) => stage.errorMessage)) {
    columns.push("error");
  }
  let output = renderTable(rows, columns, {
    colors,
    colorize: {
      status: ["Succeeded=green", "InProgress=cyan", "Failed=red"],
      error: [".*=red"],
    },
    timeAgo,
    now: options.now,
  });

  if (options.commits) {
    const history = status.commits.map((entry) => ({
      commit: revisionLink(colors, options.region, entry.commit),
      updated: entry.commit.updated,
      build: entry.build ? revisionLink(colors, options.region, entry.build) : "",
      summary: entry.commit.summary,
    }));
    output += "commits:\n";
    output += renderTable(history, ["commit", "updated", "build", "summary"], {
      colors,
      counter: true,
      timeAgo,
      now: options.now,
    });
  }
  return output;
}

function formatStageSummary(colors: ChalkInstance, stage: StageStatus): string {
  let summary = stage.summary;
  for (const user of new Set(stage.approvedBy)) {
    summary = summary.replaceAll(`Approved by ${user}`, `Approved by ${colors.green(user)}`);
  }
  if (stage.approval) {
    const note = stage.approval === "InProgress"
      ? colors.cyan.italic("InProgress...")
      : colors.red.italic("Rejected");
    summary = summary ? `${summary} ${note}` : note;
  }
  return summary;
}

function revisionLink(colors: ChalkInstance, region: string, revision: Revision): string {
  const label = shortRevisionId(revision);
  return revision.url ? hyperlink(colors, consoleUrl(region, revision.url), label) : label;
}
