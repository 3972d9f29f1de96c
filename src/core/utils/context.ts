import type { ChalkInstance } from "chalk";
import { createApiClient } from "../api/client.js";
import type { AwsApiClient } from "../api/client.js";
import type { CcprConfig } from "../config/schema.js";
import { loadConfig } from "../config/store.js";
import { GitContext } from "../git/context.js";
import { resolveColors } from "../output/style.js";
import { stdoutWriter } from "../output/writer.js";
import type { OutputWriter } from "../output/writer.js";
import { openInBrowser } from "./browser.js";
import { TerminalPrompter } from "./prompt.js";
import type { Prompter } from "./prompt.js";

/** Everything a command needs from the outside world. Tests swap in fakes. */
export type CliRuntime = {
  env: NodeJS.ProcessEnv;
  out: OutputWriter;
  colors: ChalkInstance;
  now: () => Date;
  prompt: Prompter;
  loadConfig: () => CcprConfig;
  createClient: (config: CcprConfig) => AwsApiClient;
  createGit: (config: CcprConfig) => GitContext;
  openUrl: (url: string) => void;
};

export type CommandContext = {
  config: CcprConfig;
  client: AwsApiClient;
  git: GitContext;
  out: OutputWriter;
  colors: ChalkInstance;
  now: Date;
  prompt: Prompter;
  openUrl: (url: string) => void;
};

export function createDefaultRuntime(env: NodeJS.ProcessEnv = process.env): CliRuntime {
  return {
    env,
    out: stdoutWriter,
    colors: resolveColors(),
    now: () => new Date(),
    prompt: new TerminalPrompter(),
    loadConfig: () => loadConfig(env),
    createClient: (config) => createApiClient(config, env),
    createGit: (config) => new GitContext(undefined, env, config.defaults.repository),
    openUrl: openInBrowser,
  };
}

export function openCommandContext(runtime: CliRuntime): CommandContext {
  const config = runtime.loadConfig();
  return {
    config,
    client: runtime.createClient(config),
    git: runtime.createGit(config),
    out: runtime.out,
    colors: runtime.colors,
    now: runtime.now(),
    prompt: runtime.prompt,
    openUrl: runtime.openUrl,
  };
}
