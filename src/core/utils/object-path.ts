import { isRecord } from "./records.js";

/**
 * Reads `a.b[0].c` style paths; array elements may also be addressed as `a.b.0.c`.
 */
export function getByPath(obj: unknown, dottedPath: string): unknown {
  if (!dottedPath) {
    return obj;
  }
  return splitPath(dottedPath).reduce<unknown>((acc, part) => {
    if (Array.isArray(acc)) {
      return /^\d+$/.test(part) ? acc[Number(part)] : undefined;
    }
    return isRecord(acc) ? acc[part] : undefined;
  }, obj);
}

export function setByPath(obj: Record<string, unknown>, dottedPath: string, value: unknown): Record<string, unknown> {
  const parts = splitPath(dottedPath);
  if (parts.length === 0) {
    return obj;
  }

  let cursor: Record<string, unknown> = obj;
  for (const key of parts.slice(0, -1)) {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
      continue;
    }
    const created: Record<string, unknown> = {};
    cursor[key] = created;
    cursor = created;
  }

  cursor[parts[parts.length - 1]] = value;
  return obj;
}

export function parseConfigValue(input: string): unknown {
  const trimmed = input.trim();
  // JSON literals keep their type: numbers, booleans, null, quoted strings, objects, arrays.
  try {
    return JSON.parse(trimmed);
  } catch {
    return input;
  }
}

function splitPath(dottedPath: string): string[] {
  return dottedPath
    .replace(/\[(\d+)\]/g, ".$1")
    .split(".")
    .filter((part) => part.length > 0);
}
