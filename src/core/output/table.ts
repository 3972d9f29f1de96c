import type { ChalkInstance } from "chalk";
import { getByPath } from "../utils/object-path.js";
import { styleText, visibleLength } from "./style.js";
import { formatTimeAgo, formatTimestamp } from "./time.js";

export type TableRecord = Record<string, unknown>;

export type TableOptions = {
  colors: ChalkInstance;
  title?: string;
  /** `true` adds a `#` column; a style name also colors it. */
  counter?: boolean | string;
  /** Column label -> `pattern=style` entries, first matching pattern wins. */
  colorize?: Record<string, string[]>;
  /** Column labels rendered relative to `now`. */
  timeAgo?: string[];
  now?: Date;
};

/** Records with this flag set render dimmed. */
export const DIM_FLAG = "_dim";

type Column = {
  label: string;
  path: string;
};

type ColorRule = {
  pattern: RegExp;
  style: string;
};

/**
 * Renders records as a bordered table. Columns are `label=path` (or just `path`),
 * where path is a dotted lookup into each record.
 */
export function renderTable(data: TableRecord | TableRecord[], columns: string[], options: TableOptions): string {
  const records = Array.isArray(data) ? data : [data];
  const parsedColumns = columns.map(parseColumn);
  const rules = compileColorRules(options.colorize ?? {});
  const timeAgo = new Set(options.timeAgo ?? []);
  const now = options.now ?? new Date();
  const colors = options.colors;

  const headers = parsedColumns.map((column) => column.label);
  if (options.counter !== undefined && options.counter !== false) {
    headers.unshift(typeof options.counter === "string" ? styleText(colors, options.counter, "#") : "#");
  }

  const rows = records.map((record, index) => {
    const cells = parsedColumns.map((column) => {
      let value = formatCell(getByPath(record, column.path), timeAgo.has(column.label), now);
      for (const rule of rules.get(column.label) ?? []) {
        if (rule.pattern.test(value)) {
          value = styleText(colors, rule.style, value);
          break;
        }
      }
      return value;
    });
    if (options.counter !== undefined && options.counter !== false) {
      const count = String(index + 1);
      cells.unshift(typeof options.counter === "string" ? styleText(colors, options.counter, count) : count);
    }
    return record[DIM_FLAG] === true ? cells.map((cell) => colors.dim(cell)) : cells;
  });

  const widths = headers.map((header, index) =>
    Math.max(visibleLength(header), ...rows.map((row) => visibleLength(row[index])))
  );

  const lines: string[] = [];
  if (options.title) {
    lines.push(colors.italic(options.title));
  }
  lines.push(border("┏", "━", "┳", "┓", widths));
  lines.push(`┃ ${headers.map((header, index) => pad(colors.bold(header), widths[index])).join(" ┃ ")} ┃`);
  lines.push(border("┡", "━", "╇", "┩", widths));
  for (const row of rows) {
    lines.push(`│ ${row.map((cell, index) => pad(cell, widths[index])).join(" │ ")} │`);
  }
  lines.push(border("└", "─", "┴", "┘", widths));
  return `${lines.join("\n")}\n`;
}

export function formatCell(value: unknown, relative: boolean, now: Date): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (value instanceof Date) {
    return relative ? formatTimeAgo(value, now) : formatTimestamp(value);
  }
  if (typeof value === "string") {
    if (relative && value.trim() !== "") {
      const parsed = new Date(value);
      return Number.isNaN(parsed.getTime()) ? value : formatTimeAgo(parsed, now);
    }
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

function parseColumn(definition: string): Column {
  const eqIndex = definition.indexOf("=");
  if (eqIndex <= 0) {
    return { label: definition, path: definition };
  }
  return { label: definition.slice(0, eqIndex), path: definition.slice(eqIndex + 1) };
}

function compileColorRules(colorize: Record<string, string[]>): Map<string, ColorRule[]> {
  const compiled = new Map<string, ColorRule[]>();
  for (const [label, entries] of Object.entries(colorize)) {
    const rules: ColorRule[] = [];
    for (const entry of entries) {
      const eqIndex = entry.lastIndexOf("=");
      if (eqIndex <= 0) {
        continue;
      }
      rules.push({
        pattern: new RegExp(`^(?:${entry.slice(0, eqIndex)})`),
        style: entry.slice(eqIndex + 1),
      });
    }
    compiled.set(label, rules);
  }
  return compiled;
}

function border(left: string, fill: string, join: string, right: string, widths: number[]): string {
  return `${left}${widths.map((width) => fill.repeat(width + 2)).join(join)}${right}`;
}

function pad(text: string, width: number): string {
  return `${text}${" ".repeat(Math.max(0, width - visibleLength(text)))}`;
}
