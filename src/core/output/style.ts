import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";

const STYLES = {
  red: (colors: ChalkInstance) => colors.red,
  green: (colors: ChalkInstance) => colors.green,
  cyan: (colors: ChalkInstance) => colors.cyan,
  white: (colors: ChalkInstance) => colors.white,
  yellow: (colors: ChalkInstance) => colors.yellow,
  grey: (colors: ChalkInstance) => colors.gray,
  bold: (colors: ChalkInstance) => colors.bold,
  dim: (colors: ChalkInstance) => colors.dim,
  italic: (colors: ChalkInstance) => colors.italic,
  underline: (colors: ChalkInstance) => colors.underline,
} satisfies Record<string, (colors: ChalkInstance) => ChalkInstance>;

export type StyleName = keyof typeof STYLES;

// CSI sequences (colors) and OSC 8 hyperlinks
const ANSI_PATTERN = /\u001b\[[0-9;]*m|\u001b\]8;[^\u0007\u001b]*;[^\u0007\u001b]*(?:\u0007|\u001b\\)/g;

export function resolveColors(enabled?: boolean): ChalkInstance {
  if (enabled === false) {
    return new Chalk({ level: 0 });
  }
  return chalk;
}

/**
 * Applies a space separated style list such as `"bold red"`. Unknown names are rejected.
 */
export function styleText(colors: ChalkInstance, styles: string, text: string): string {
  let style = colors;
  for (const name of styles.split(/\s+/).filter(Boolean)) {
    if (!isStyleName(name)) {
      throw new Error(`Unknown style: ${name}`);
    }
    style = STYLES[name](style);
  }
  return style(text);
}

export function isStyleName(name: string): name is StyleName {
  return Object.prototype.hasOwnProperty.call(STYLES, name);
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

export function visibleLength(text: string): number {
  return [...stripAnsi(text)].length;
}
