import path from "node:path";
import { Command } from "commander";
import { getBlobText, getRepositoryFolder, listRepositoryNames } from "../core/api/repo.js";
import { CliError } from "../core/errors.js";
import { assertRichOutputFileOption, emitStructuredOutput, normalizeRichOutputFormat } from "../core/output/rich.js";
import { renderTable } from "../core/output/table.js";
import { openCommandContext } from "../core/utils/context.js";
import type { CliRuntime, CommandContext } from "../core/utils/context.js";
import { escapeRegExp, hasGlobCharacters, matchesGlob } from "../core/utils/glob.js";

type ReposOptions = {
  filter?: string;
  format?: string;
  out?: string;
  json?: boolean;
};

type GrepOptions = {
  branch?: string;
  repo?: string;
  recursive?: boolean;
  insensitive?: boolean;
  verbose?: boolean;
};

/** Blob contents change rarely; grep runs reuse them for two minutes. */
const GREP_BLOB_CACHE_SECS = 120;

export function registerRepoCommands(program: Command, runtime: CliRuntime): void {
  program
    .command("repos")
    .alias("r")
    .description("List repositories")
    .option("-f, --filter <pattern>", "Only repositories whose name matches the pattern")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write repository list output to file")
    .option("--json", "Print raw JSON")
    .action(async (options: ReposOptions) => {
      const format = normalizeRichOutputFormat(options.format, options.json);
      assertRichOutputFileOption(options.out, format);
      const ctx = openCommandContext(runtime);

      const names = await listRepositoryNames(ctx.client);
      const filter = options.filter ? new RegExp(options.filter) : undefined;
      const rows = names.filter((name) => !filter || filter.test(name)).map((name) => ({ name }));

      if (emitStructuredOutput(ctx.out, rows, { format, out: options.out, label: "repository list" })) {
        return;
      }
      ctx.out.write(renderTable(rows, ["name"], { colors: ctx.colors }));
    });

  program
    .command("grep")
    .alias("g")
    .description("Search files of remote repositories for a string")
    .argument("<text>", "Text to search for")
    .argument("<path>", "Folder and file glob within the repository, e.g. src/*.ts")
    .option("-b, --branch <branch>", "Branch to search (defaults to defaults.mainBranch)")
    .option("-r, --repo <repos>", "Repository names or globs, comma-separated (defaults to the current repository)")
    .option("-R, --recursive", "Descend into sub folders", false)
    .option("-i, --insensitive", "Case-insensitive match", false)
    .option("-v, --verbose", "Also print files without a match", false)
    .action(async (text: string, searchPath: string, options: GrepOptions) => {
      const ctx = openCommandContext(runtime);
      const repoOption = options.repo ?? ctx.git.currentRepository();
      if (!repoOption) {
        throw new CliError("--repo must be specified outside a git repository");
      }
      const repositories = await resolveGrepRepositories(ctx, repoOption);
      const { folder, filePattern } = splitSearchPath(searchPath);
      const search = new GrepSearch(ctx, {
        text,
        filePattern,
        branch: options.branch ?? ctx.config.defaults.mainBranch,
        recursive: Boolean(options.recursive),
        insensitive: Boolean(options.insensitive),
        verbose: Boolean(options.verbose),
        primaryRepository: repoOption,
      });
      for (const repository of repositories) {
        await search.searchFolder(repository, folder);
      }
    });
}

/** `/`, `.` and `.*` mean every file at the root; the last segment is the file glob. */
export function splitSearchPath(searchPath: string): { folder: string; filePattern: string } {
  let normalized = ["/", ".", ".*"].includes(searchPath) ? "/*" : searchPath;
  if (!normalized.startsWith("/")) {
    normalized = `/${normalized}`;
  }
  return {
    folder: path.posix.dirname(normalized),
    filePattern: path.posix.basename(normalized),
  };
}

async function resolveGrepRepositories(ctx: CommandContext, repoOption: string): Promise<string[]> {
  if (!hasGlobCharacters(repoOption) && !repoOption.includes(",")) {
    return [repoOption];
  }
  const all = await listRepositoryNames(ctx.client);
  const selected: string[] = [];
  for (const pattern of repoOption.split(",").map((item) => item.trim()).filter(Boolean)) {
    for (const name of all) {
      if ((name === pattern || matchesGlob(name, pattern)) && !selected.includes(name)) {
        selected.push(name);
      }
    }
  }
  return selected;
}

type GrepSettings = {
  text: string;
  filePattern: string;
  branch: string;
  recursive: boolean;
  insensitive: boolean;
  verbose: boolean;
  primaryRepository: string;
};

class GrepSearch {
  private readonly matcher: RegExp;

  constructor(
    private readonly ctx: CommandContext,
    private readonly settings: GrepSettings
  ) {
    this.matcher = new RegExp(escapeRegExp(settings.text), settings.insensitive ? "gi" : "g");
  }

  async searchFolder(repository: string, folder: string): Promise<void> {
    const listing = await getRepositoryFolder(this.ctx.client, {
      repositoryName: repository,
      commitSpecifier: this.settings.branch,
      folderPath: folder,
    });

    const candidates = listing.files.filter((file) => {
      if (matchesGlob(path.posix.basename(file.path), this.settings.filePattern)) {
        return true;
      }
      this.ctx.out.write(this.noMatch(repository, file.path));
      return false;
    });

    const outputs = await this.ctx.client.join(candidates, (file) => this.searchFile(repository, file));
    for (const output of outputs) {
      this.ctx.out.write(output);
    }

    if (this.settings.recursive) {
      for (const sub of listing.folders) {
        await this.searchFolder(repository, sub);
      }
    }
  }

  private async searchFile(repository: string, file: { path: string; blobId: string }): Promise<string> {
    const content = await getBlobText(this.ctx.client, {
      repositoryName: repository,
      blobId: file.blobId,
      cacheSecs: GREP_BLOB_CACHE_SECS,
    });
    const { colors } = this.ctx;
    let output = "";
    for (const line of content.split(/\r?\n/)) {
      this.matcher.lastIndex = 0;
      if (!this.matcher.test(line)) {
        continue;
      }
      const highlighted = line.replace(this.matcher, (match) => colors.green(match));
      output += `${this.prefix(repository)}/${file.path}:    ${highlighted}\n`;
    }
    return output || this.noMatch(repository, file.path);
  }

  private noMatch(repository: string, file: string): string {
    if (!this.settings.verbose) {
      return "";
    }
    return `${this.prefix(repository)}${this.ctx.colors.gray(`/${file}:    no match`)}\n`;
  }

  private prefix(repository: string): string {
    return repository === this.settings.primaryRepository ? "" : `${this.ctx.colors.cyan(repository)}: `;
  }
}
