import type { ChalkInstance } from "chalk";
import { renderTable } from "../output/table.js";
import type { DiffRow } from "./lines.js";

export type InlineComment = {
  author: string;
  comment: string;
};

/** New-file line number -> comments posted on that line. */
export type LineComments = Map<number, InlineComment[]>;

export type DiffRenderOptions = {
  colors: ChalkInstance;
  comments?: LineComments;
  ruleWidth?: number;
};

const DEFAULT_RULE_WIDTH = 80;

const ROW_CODES = {
  context: " ",
  added: "+",
  removed: "-",
} as const;

export function renderDiffRows(rows: DiffRow[], options: DiffRenderOptions): string {
  const { colors } = options;
  const ruleWidth = options.ruleWidth ?? (process.stdout.columns || DEFAULT_RULE_WIDTH);
  let output = "";

  for (const row of rows) {
    if (row.kind === "separator") {
      output += `${colors.white("─".repeat(ruleWidth))}\n`;
      continue;
    }

    const oldLine = row.kind === "added" ? "" : String(row.oldLine);
    const newLine = row.kind === "removed" ? "" : String(row.newLine);
    const text = `${oldLine.padStart(4)} ${newLine.padStart(4)}: ${ROW_CODES[row.kind]} ${row.text}`;
    output += `${colorFor(colors, row.kind)(text)}\n`;

    if (row.kind !== "removed") {
      const comments = options.comments?.get(row.newLine);
      if (comments && comments.length > 0) {
        output += renderCommentTable(comments, colors);
      }
    }
  }
  return output;
}

export function renderCommentTable(comments: InlineComment[], colors: ChalkInstance, title?: string): string {
  return renderTable(comments, ["author", "comment"], {
    colors,
    title,
    colorize: {
      author: [".*=cyan"],
      comment: [".*=cyan"],
    },
  });
}

export type FileChange = "added" | "deleted" | "modified";

/** File header: bold name, then optional change and comment count markers. */
export function renderDiffHeader(
  name: string,
  colors: ChalkInstance,
  markers: { change?: FileChange; commentCount?: number } = {}
): string {
  const parts = [colors.bold.white(name)];
  if (markers.change === "modified") {
    parts.push(colors.green("+modified+"));
  } else if (markers.change === "added") {
    parts.push(colors.green("+added+"));
  } else if (markers.change === "deleted") {
    parts.push(colors.red("-deleted-"));
  }
  if (markers.commentCount) {
    parts.push(colors.cyan(`${markers.commentCount} comment(s)`));
  }
  return `${parts.join(" ")}\n`;
}

function colorFor(colors: ChalkInstance, kind: "context" | "added" | "removed"): ChalkInstance {
  if (kind === "added") {
    return colors.green;
  }
  if (kind === "removed") {
    return colors.red;
  }
  return colors.white;
}
