import { Command, Option } from "commander";
import { getPullRequest } from "../core/api/pr.js";
import { listRepositoryNames } from "../core/api/repo.js";
import { assertRichOutputFileOption, emitStructuredOutput, normalizeRichOutputFormat } from "../core/output/rich.js";
import { openCommandContext } from "../core/utils/context.js";
import type { CliRuntime } from "../core/utils/context.js";
import { listPullRequestFilePaths } from "./pr.js";

type CompletionOptions = {
  format?: string;
  out?: string;
  json?: boolean;
};

type Shell = "bash" | "zsh" | "powershell";

const COMPLETE_COMMAND = "__complete";
const REPO_ARGUMENT = "repo";
const REPO_OPTION = "--repo";
const FILE_OPTION = "--file";
const COMMENT_COMMAND = "comment";

export type CompletionContext = {
  command: Command;
  expectingValueFor?: Option;
  /** Positional arguments already given to `command`. */
  args: string[];
};

/** Remote lookups behind dynamic suggestions. */
export interface CompletionSources {
  repositories(): Promise<string[]>;
  pullRequestFiles(pullRequestId: string): Promise<string[]>;
}

export function registerCompletionCommand(program: Command, runtime: CliRuntime): void {
  const completion = program.command("completion").description("Generate shell completion scripts");

  for (const shell of ["bash", "zsh", "powershell"] as const) {
    completion
      .command(shell)
      .description(`Generate ${shell} completion script`)
      .option("--format <format>", "table | tsv | json", "table")
      .option("--out <path>", "Write completion output to file")
      .option("--json", "Print raw JSON")
      .action((options: CompletionOptions) => {
        emitCompletionOutput(runtime, shell, options);
      });
  }

  program
    .command(COMPLETE_COMMAND, { hidden: true })
    .argument("[words...]", "Completion words")
    .allowUnknownOption(true)
    .action(async (words: string[] = []) => {
      const suggestions = await resolveCompletionSuggestions(program, words, {
        repositories: () => listRepositoryNames(openCommandContext(runtime).client),
        pullRequestFiles: async (pullRequestId) => {
          const { client } = openCommandContext(runtime);
          return listPullRequestFilePaths(client, { pullRequest: await getPullRequest(client, { pullRequestId }) });
        },
      });
      runtime.out.write(`${suggestions.join("\n")}\n`);
    });
}

function emitCompletionOutput(runtime: CliRuntime, shell: Shell, options: CompletionOptions): void {
  const format = normalizeRichOutputFormat(options.format, options.json);
  assertRichOutputFileOption(options.out, format);
  const script = COMPLETION_SCRIPTS[shell];
  if (emitStructuredOutput(runtime.out, { shell, script }, { format, out: options.out, label: "completion" })) {
    return;
  }
  runtime.out.write(script);
}

/**
 * Suggestions for the last word: subcommands and flags of the command reached
 * so far, repository names where a repository is expected, and the changed
 * files of the pull request for `comment <id> --file`.
 */
export async function resolveCompletionSuggestions(
  root: Command,
  words: string[],
  sources: CompletionSources
): Promise<string[]> {
  const current = words.length > 0 ? words[words.length - 1] : "";
  const context = resolveCommandContext(root, words.slice(0, -1));

  const option = context.expectingValueFor;
  if (option) {
    if (option.long === REPO_OPTION) {
      return filterSorted(await sources.repositories(), current);
    }
    const pullRequestId = context.args[0];
    if (option.long === FILE_OPTION && context.command.name() === COMMENT_COMMAND && pullRequestId) {
      return filterSorted(await sources.pullRequestFiles(pullRequestId), current);
    }
    return [];
  }

  if (current.startsWith("-")) {
    return filterSorted(listOptionFlags(context.command), current);
  }

  const candidates = [...listSubcommands(context.command), ...listOptionFlags(context.command)];
  if (expectsRepositoryArgument(context)) {
    candidates.push(...(await sources.repositories()));
  }
  return filterSorted(candidates, current);
}

export function resolveCommandContext(root: Command, tokens: string[]): CompletionContext {
  let command = root;
  let expectingValueFor: Option | undefined;
  let args: string[] = [];

  for (const token of tokens) {
    if (expectingValueFor) {
      expectingValueFor = undefined;
      continue;
    }
    if (token === "--") {
      break;
    }
    if (token.startsWith("-")) {
      const option = findOption(command, token);
      if (option && (option.required || option.optional) && !token.includes("=")) {
        expectingValueFor = option;
      }
      continue;
    }

    const subcommand = args.length === 0 ? findSubcommand(command, token) : undefined;
    if (subcommand) {
      command = subcommand;
      args = [];
    } else {
      args.push(token);
    }
  }

  return { command, expectingValueFor, args };
}

function expectsRepositoryArgument(context: CompletionContext): boolean {
  const argument = context.command.registeredArguments[context.args.length];
  return argument?.name() === REPO_ARGUMENT;
}

function listSubcommands(command: Command): string[] {
  const output: string[] = [];
  for (const sub of command.commands) {
    if (sub.name() === COMPLETE_COMMAND) {
      continue;
    }
    output.push(sub.name());
    output.push(...sub.aliases());
  }
  return output;
}

function listOptionFlags(command: Command): string[] {
  const output: string[] = [];
  for (const option of command.options) {
    if (option.long) {
      output.push(option.long);
    }
    if (option.short) {
      output.push(option.short);
    }
  }
  return output;
}

function findSubcommand(command: Command, token: string): Command | undefined {
  return command.commands.find((sub) => sub.name() === token || sub.aliases().includes(token));
}

function findOption(command: Command, token: string): Option | undefined {
  return command.options.find((option) => {
    if (option.long && (token === option.long || token.startsWith(`${option.long}=`))) {
      return true;
    }
    return option.short ? token === option.short : false;
  });
}

function filterSorted(values: string[], prefix: string): string[] {
  return [...new Set(values.filter((item) => item.startsWith(prefix)))].sort((a, b) => a.localeCompare(b));
}

const BASH_COMPLETION_SCRIPT = `# ccpr bash completion
_ccpr_completion() {
  local cur
  cur="\${COMP_WORDS[COMP_CWORD]}"

  local args=()
  local i
  for ((i=1; i<COMP_CWORD; i++)); do
    args+=("\${COMP_WORDS[i]}")
  done
  args+=("$cur")

  local out
  out="$(ccpr __complete "\${args[@]}" 2>/dev/null)" || return

  COMPREPLY=()
  while IFS= read -r line; do
    [[ -n "$line" ]] && COMPREPLY+=("$line")
  done <<< "$out"
}

complete -F _ccpr_completion ccpr
`;

const ZSH_COMPLETION_SCRIPT = `#compdef ccpr
# ccpr zsh completion
_ccpr_completion() {
  local -a args
  local i
  for ((i=2; i<CURRENT; i++)); do
    args+=("\${words[i]}")
  done
  args+=("\${words[CURRENT]}")

  local -a suggestions
  suggestions=("\${(@f)\$(ccpr __complete "\${args[@]}" 2>/dev/null)}")
  compadd -a suggestions
}

compdef _ccpr_completion ccpr
`;

const POWERSHELL_COMPLETION_SCRIPT = `# ccpr powershell completion
Register-ArgumentCompleter -Native -CommandName ccpr -ScriptBlock {
  param($wordToComplete, $commandAst, $cursorPosition)

  $words = @()
  $elements = $commandAst.CommandElements | Select-Object -Skip 1
  foreach ($element in $elements) {
    $words += $element.Extent.Text
  }
  if ($wordToComplete -eq '') { $words += '' }

  $suggestions = & ccpr __complete @words 2>$null
  foreach ($item in $suggestions) {
    if ([string]::IsNullOrWhiteSpace($item)) { continue }
    [System.Management.Automation.CompletionResult]::new($item, $item, 'ParameterValue', $item)
  }
}
`;

const COMPLETION_SCRIPTS: Record<Shell, string> = {
  bash: BASH_COMPLETION_SCRIPT,
  zsh: ZSH_COMPLETION_SCRIPT,
  powershell: POWERSHELL_COMPLETION_SCRIPT,
};
