import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ZodError } from "zod";
import { CcprConfigSchema } from "./schema.js";
import type { CcprConfig } from "./schema.js";
import { CliError } from "../errors.js";

const CONFIG_DIR_NAME = ".ccpr";
const CONFIG_FILE_NAME = "config.json";

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CCPR_CONFIG_DIR?.trim();
  if (override) {
    return override;
  }
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILE_NAME);
}

export function getDefaultConfig(): CcprConfig {
  return CcprConfigSchema.parse({});
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CcprConfig {
  const configPath = getConfigPath(env);
  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  let rawParsed: unknown;
  try {
    rawParsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new CliError(`Invalid config JSON at ${configPath}. Fix the file or run \`ccpr config get\` to inspect it.`, error);
  }

  const parsed = CcprConfigSchema.safeParse(rawParsed);
  if (!parsed.success) {
    throw new CliError(`Invalid config format: ${formatConfigValidationError(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

export function saveConfig(config: CcprConfig, env: NodeJS.ProcessEnv = process.env): void {
  const validated = CcprConfigSchema.parse(config);
  writeConfigFile(validated, env);
}

/**
 * Cache lifetime for read calls. `CCPR_CACHE_SECS` wins over the config file.
 */
export function resolveCacheSeconds(config: CcprConfig, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.CCPR_CACHE_SECS?.trim();
  if (!raw) {
    return config.cache.ttlSeconds;
  }
  if (!/^\d+$/.test(raw)) {
    throw new CliError(`Invalid CCPR_CACHE_SECS value: ${raw}. Use a non-negative integer.`);
  }
  return Number(raw);
}

export function formatConfigValidationError(error: ZodError): string {
  const first = error.issues[0];
  if (!first) {
    return "schema validation failed";
  }
  const where = first.path.length > 0 ? first.path.join(".") : "(root)";
  return `${where}: ${first.message}`;
}

function writeConfigFile(config: CcprConfig, env: NodeJS.ProcessEnv): void {
  const dir = getConfigDir(env);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(getConfigPath(env), `${JSON.stringify(config, null, 2)}\n`, "utf-8");
}
