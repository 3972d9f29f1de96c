import { spawnSync } from "node:child_process";
import { CliError } from "../errors.js";

export function openInBrowser(url: string): void {
  const [command, args] = browserLauncher(url);
  const result = spawnSync(command, args, { stdio: "ignore" });
  if (result.status !== 0) {
    throw new CliError(`Failed to open browser for console URL: ${url}`);
  }
}

function browserLauncher(url: string): [string, string[]] {
  switch (process.platform) {
    case "win32":
      return ["cmd", ["/c", "start", "", url]];
    case "darwin":
      return ["open", [url]];
    default:
      return ["xdg-open", [url]];
  }
}
