import { readFileSync } from "node:fs";
import { Command } from "commander";
import { computeLineDiff, DEFAULT_CONTEXT_LINES } from "../core/diff/lines.js";
import { renderDiffRows } from "../core/diff/render.js";
import { CliError } from "../core/errors.js";
import type { CliRuntime } from "../core/utils/context.js";

export function registerDiffCommand(program: Command, runtime: CliRuntime): void {
  program
    .command("diff")
    .alias("d")
    .description("Colorized diff of two local files")
    .argument("<file1>", "Original file")
    .argument("<file2>", "Changed file")
    .action((file1: string, file2: string) => {
      const rows = computeLineDiff(readText(file1), readText(file2), DEFAULT_CONTEXT_LINES);
      runtime.out.write(renderDiffRows(rows, { colors: runtime.colors }));
    });
}

function readText(file: string): string {
  try {
    return readFileSync(file, "utf-8");
  } catch (error) {
    throw new CliError(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`, error);
  }
}
