import { Command } from "commander";
import { registerCompletionCommand } from "./commands/completion.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerDiffCommand } from "./commands/diff.js";
import { registerPipelineCommand } from "./commands/pipeline.js";
import { registerPrCommands } from "./commands/pr.js";
import { registerRepoCommands } from "./commands/repo.js";
import type { CliRuntime } from "./core/utils/context.js";

export const VERSION = "1.0.2";

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name("ccpr")
    .description("AWS CodeCommit pull request CLI")
    .version(VERSION);

  registerPrCommands(program, runtime);
  registerRepoCommands(program, runtime);
  registerPipelineCommand(program, runtime);
  registerDiffCommand(program, runtime);
  registerConfigCommand(program, runtime);
  registerCompletionCommand(program, runtime);

  return program;
}
