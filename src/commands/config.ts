import { Command } from "commander";
import { getByPath, parseConfigValue, setByPath } from "../core/utils/object-path.js";
import { formatConfigValidationError, getConfigPath, saveConfig } from "../core/config/store.js";
import { CcprConfigSchema } from "../core/config/schema.js";
import { assertRichOutputFileOption, emitStructuredOutput, normalizeRichOutputFormat } from "../core/output/rich.js";
import { CliError } from "../core/errors.js";
import type { CliRuntime } from "../core/utils/context.js";

type OutputOptions = {
  format?: string;
  out?: string;
  json?: boolean;
};

export function registerConfigCommand(program: Command, runtime: CliRuntime): void {
  const configCommand = program.command("config").description("Read or update ccpr configuration");

  configCommand
    .command("path")
    .description("Print config file path")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config path output to file")
    .option("--json", "Print raw JSON")
    .action((options: OutputOptions) => {
      const format = normalizeRichOutputFormat(options.format, options.json);
      assertRichOutputFileOption(options.out, format);
      const configPath = getConfigPath(runtime.env);
      if (emitStructuredOutput(runtime.out, { path: configPath }, { format, out: options.out, label: "config path" })) {
        return;
      }
      runtime.out.write(`${configPath}\n`);
    });

  configCommand
    .command("get")
    .description("Get full config or one value by dotted path")
    .argument("[key]", "Dotted key path, e.g. defaults.mainBranch")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config get output to file")
    .option("--json", "Print raw JSON")
    .action((key: string | undefined, options: OutputOptions) => {
      const format = normalizeRichOutputFormat(options.format, options.json);
      assertRichOutputFileOption(options.out, format);
      const config = runtime.loadConfig();
      const result = key ? getByPath(config, key) : config;
      if (emitStructuredOutput(runtime.out, result, { format, out: options.out, label: "config get" })) {
        return;
      }
      if (result === undefined) {
        throw new CliError(`Config key not set: ${key ?? ""}`);
      }
      runtime.out.write(typeof result === "string" ? `${result}\n` : `${JSON.stringify(result, null, 2)}\n`);
    });

  configCommand
    .command("set")
    .description("Set one config value by dotted path")
    .argument("<key>", "Dotted key path")
    .argument("<value>", "Value, supports JSON literals")
    .action((key: string, value: string) => {
      const config = runtime.loadConfig();
      const mutable: Record<string, unknown> = structuredClone(config);
      setByPath(mutable, key, parseConfigValue(value));
      let parsed = CcprConfigSchema.safeParse(mutable);
      if (!parsed.success) {
        // a value such as `123` may be meant as a string
        setByPath(mutable, key, value);
        const retried = CcprConfigSchema.safeParse(mutable);
        if (retried.success) {
          parsed = retried;
        }
      }
      if (!parsed.success) {
        throw new CliError(`Invalid config value for ${key}: ${formatConfigValidationError(parsed.error)}`);
      }
      saveConfig(parsed.data, runtime.env);
      runtime.out.write(`Updated ${key}\n`);
    });
}
