import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { isRecord } from "../utils/records.js";

const CACHE_FILE_SUFFIX = ".cache";
const DATE_TAG = "$date";
const BYTES_TAG = "$bytes";

/**
 * Short-lived file cache of service responses, shared between invocations
 * so that chained commands (`prs` then `pr 12`) do not refetch everything.
 */
export class ResponseCache {
  constructor(
    private readonly dir: string = path.join(os.tmpdir(), "ccpr"),
    private readonly now: () => number = Date.now
  ) {}

  read<T>(operation: string, input: unknown, maxAgeSecs: number): T | undefined {
    if (maxAgeSecs <= 0) {
      return undefined;
    }
    this.purge(maxAgeSecs);
    const file = this.fileFor(operation, input);
    if (!fs.existsSync(file)) {
      return undefined;
    }
    let value: T;
    try {
      // Entries are only ever written by `write` for the same operation and input.
      value = JSON.parse(fs.readFileSync(file, "utf-8"), reviveCacheValue);
    } catch (error) {
      if (error instanceof SyntaxError) {
        fs.rmSync(file, { force: true });
        return undefined;
      }
      throw error;
    }
    return value;
  }

  /** Writes beside the entry and renames it into place, so readers never see a partial file. */
  write(operation: string, input: unknown, value: unknown): void {
    fs.mkdirSync(this.dir, { recursive: true });
    const file = this.fileFor(operation, input);
    const staging = `${file}.${process.pid}.${crypto.randomUUID()}.tmp`;
    fs.writeFileSync(staging, JSON.stringify(value, replaceCacheValue), "utf-8");
    fs.renameSync(staging, file);
  }

  purge(maxAgeSecs: number): void {
    if (!fs.existsSync(this.dir)) {
      return;
    }
    const cutoff = this.now() - maxAgeSecs * 1000;
    for (const name of fs.readdirSync(this.dir)) {
      if (!name.endsWith(CACHE_FILE_SUFFIX)) {
        continue;
      }
      const file = path.join(this.dir, name);
      // another invocation may purge the same file concurrently
      const stat = fs.statSync(file, { throwIfNoEntry: false });
      if (stat && stat.mtimeMs < cutoff) {
        fs.rmSync(file, { force: true });
      }
    }
  }

  fileFor(operation: string, input: unknown): string {
    const digest = crypto.createHash("sha256").update(JSON.stringify(input ?? {})).digest("hex");
    return path.join(this.dir, `${operation}-${digest}${CACHE_FILE_SUFFIX}`);
  }
}

export function replaceCacheValue(this: unknown, key: string, value: unknown): unknown {
  const raw = isRecord(this) ? this[key] : undefined;
  if (raw instanceof Date) {
    return { [DATE_TAG]: raw.toISOString() };
  }
  if (raw instanceof Uint8Array) {
    return { [BYTES_TAG]: Buffer.from(raw).toString("base64") };
  }
  return value;
}

export function reviveCacheValue(_key: string, value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  const keys = Object.keys(value);
  if (keys.length !== 1) {
    return value;
  }
  const date = value[DATE_TAG];
  if (typeof date === "string") {
    return new Date(date);
  }
  const bytes = value[BYTES_TAG];
  if (typeof bytes === "string") {
    return new Uint8Array(Buffer.from(bytes, "base64"));
  }
  return value;
}
