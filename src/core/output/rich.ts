import fs from "node:fs";
import { CliError } from "../errors.js";
import { isRecord } from "../utils/records.js";
import type { OutputWriter } from "./writer.js";

export type RichOutputFormat = "table" | "tsv" | "json";

export type StructuredOutputOptions = {
  format: RichOutputFormat;
  out?: string;
  /** Noun used in the "Saved ... output" message. */
  label: string;
};

export function normalizeRichOutputFormat(format: string | undefined, jsonFlag?: boolean): RichOutputFormat {
  if (jsonFlag) {
    return "json";
  }
  const value = (format ?? "table").trim().toLowerCase();
  if (value === "table" || value === "tsv" || value === "json") {
    return value;
  }
  throw new CliError(`Invalid --format value: ${format}. Use table, tsv, or json.`);
}

export function assertRichOutputFileOption(outputPath: string | undefined, format: RichOutputFormat): void {
  if (outputPath && format === "table") {
    throw new CliError("`--out` requires --format tsv/json (or --json).");
  }
}

export function renderRichOutput(data: unknown, format: Exclude<RichOutputFormat, "table">): string {
  if (format === "tsv") {
    return `${toTsv(data)}\n`;
  }
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function writeRichOutputFile(path: string, content: string): void {
  fs.writeFileSync(path, content, "utf8");
}

/**
 * Writes tsv/json output to `--out` or the writer. Returns false for the table
 * format, which each command renders itself.
 */
export function emitStructuredOutput(writer: OutputWriter, data: unknown, options: StructuredOutputOptions): boolean {
  if (options.format === "table") {
    return false;
  }
  const content = renderRichOutput(data, options.format);
  if (options.out) {
    writeRichOutputFile(options.out, content);
    writer.write(`Saved ${options.label} output to ${options.out}.\n`);
    return true;
  }
  writer.write(content);
  return true;
}

function toTsv(data: unknown): string {
  if (Array.isArray(data)) {
    return recordsToTsv(data.map(normalizeRecord));
  }

  if (isRecord(data)) {
    const rows = Object.entries(data).map(([key, value]) => ({
      key,
      value,
    }));
    return recordsToTsv(rows);
  }

  return recordsToTsv([{ value: data }]);
}

function normalizeRecord(value: unknown): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  return { value };
}

function recordsToTsv(records: Record<string, unknown>[]): string {
  const columns = collectColumns(records);
  const lines = [columns.join("\t")];
  for (const record of records) {
    lines.push(columns.map((column) => formatTsvCell(record[column])).join("\t"));
  }
  return lines.join("\n");
}

function collectColumns(records: Record<string, unknown>[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      keys.add(key);
    }
  }
  if (keys.size === 0) {
    return ["value"];
  }
  return Array.from(keys);
}

function formatTsvCell(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "string") {
    return value.replaceAll("\t", " ").replaceAll("\r", " ").replaceAll("\n", " ");
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value).replaceAll("\t", " ").replaceAll("\r", " ").replaceAll("\n", " ");
}
