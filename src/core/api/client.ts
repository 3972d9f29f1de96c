import { CliError } from "../errors.js";
import type { CcprConfig } from "../config/schema.js";
import { resolveCacheSeconds } from "../config/store.js";
import { ResponseCache } from "./cache.js";
import { createServiceApis } from "./services.js";
import type { CodeCommitApi, CodePipelineApi, ServiceApis } from "./services.js";

type CallOptions = {
  /** Overrides the client default; `0` skips the cache entirely. */
  cacheSecs?: number;
};

const JOIN_CONCURRENCY = 5;

export class AwsApiClient {
  readonly codecommit: CodeCommitApi;
  readonly codepipeline: CodePipelineApi;

  constructor(
    private readonly apis: ServiceApis,
    private readonly cache: ResponseCache,
    private readonly defaultCacheSecs: number,
    private readonly trace: (line: string) => void = () => undefined
  ) {
    this.codecommit = apis.codecommit;
    this.codepipeline = apis.codepipeline;
  }

  region(): Promise<string> {
    return this.apis.region();
  }

  async call<Input, Output>(
    operation: string,
    input: Input,
    fetch: (input: Input) => Promise<Output>,
    options: CallOptions = {}
  ): Promise<Output> {
    const cacheSecs = options.cacheSecs ?? this.defaultCacheSecs;
    const cached = this.cache.read<Output>(operation, input, cacheSecs);
    if (cached !== undefined) {
      this.trace(`cache hit ${operation} ${JSON.stringify(input)}`);
      return cached;
    }

    this.trace(`call ${operation} ${JSON.stringify(input)}`);
    let output: Output;
    try {
      output = await fetch(input);
    } catch (error) {
      throw normalizeServiceError(operation, error);
    }
    if (cacheSecs > 0) {
      this.cache.write(operation, input, output);
    }
    return output;
  }

  /** Runs `action` over `items` with at most five calls in flight, keeping input order. */
  async join<T, R>(items: readonly T[], action: (item: T) => Promise<R>): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next;
        next += 1;
        results[index] = await action(items[index]);
      }
    };
    const workers = Array.from({ length: Math.min(JOIN_CONCURRENCY, items.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }
}

export function createApiClient(config: CcprConfig, env: NodeJS.ProcessEnv = process.env): AwsApiClient {
  const apis = createServiceApis({ region: config.aws.region });
  const trace = env.CCPR_DEBUG === "1"
    ? (line: string) => {
        process.stderr.write(`[ccpr] ${line}\n`);
      }
    : undefined;
  return new AwsApiClient(apis, new ResponseCache(), resolveCacheSeconds(config, env), trace);
}

export function normalizeServiceError(operation: string, error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof Error) {
    const name = error.name && error.name !== "Error" ? `${error.name}: ` : "";
    return new CliError(`unable to ${operation}: ${name}${error.message}`, error);
  }
  return new CliError(`unable to ${operation}: ${String(error)}`, error);
}
