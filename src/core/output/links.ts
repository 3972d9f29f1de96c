import type { ChalkInstance } from "chalk";

const CONSOLE_HOST_SUFFIX = "console.aws.amazon.com/codesuite";

/**
 * Console URL for a `/codecommit/...` or `/codepipeline/...` path. Absolute URLs are returned unchanged.
 */
export function consoleUrl(region: string, pathOrUrl: string): string {
  if (!pathOrUrl.startsWith("/")) {
    return pathOrUrl;
  }
  const separator = pathOrUrl.includes("?") ? "&" : "?";
  return `https://${region}.${CONSOLE_HOST_SUFFIX}${pathOrUrl}${separator}region=${region}`;
}

/** Terminal hyperlink; plain text when colors are off. */
export function hyperlink(colors: ChalkInstance, url: string, text: string): string {
  if (colors.level === 0) {
    return text;
  }
  return `\u001b]8;;${url}\u0007${text}\u001b]8;;\u0007`;
}

export function formatLinkLine(colors: ChalkInstance, url: string): string {
  return `${colors.cyan(`link: ${colors.underline(url)}`)}\n`;
}
