import { InvalidArgumentError } from "commander";
import { MERGE_STRATEGIES } from "../config/schema.js";
import type { MergeStrategy } from "../config/schema.js";

export function parseIntegerOption(value: string, label = "number"): number {
  const normalized = String(value ?? "").trim();
  if (!/^-?\d+$/.test(normalized)) {
    throw new InvalidArgumentError(`${label} must be an integer, got: ${value}`);
  }

  const parsed = Number(normalized);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${label} is out of supported range: ${value}`);
  }
  return parsed;
}

export function parseLineNumberOption(value: string): number {
  const parsed = parseIntegerOption(value, "line number");
  if (parsed <= 0) {
    throw new InvalidArgumentError(`line number must be a positive integer, got: ${value}`);
  }
  return parsed;
}

export function parseMergeStrategyOption(value: string): MergeStrategy {
  const strategy = MERGE_STRATEGIES.find((item) => item === value.trim());
  if (!strategy) {
    throw new InvalidArgumentError(`strategy must be one of ${MERGE_STRATEGIES.join(", ")}, got: ${value}`);
  }
  return strategy;
}
