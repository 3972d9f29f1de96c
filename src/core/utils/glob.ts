/**
 * Shell style wildcard match (`*`, `?`, `[seq]`, `[!seq]`) against the whole name.
 */
export function matchesGlob(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name);
}

export function hasGlobCharacters(pattern: string): boolean {
  return /[*?[]/.test(pattern);
}

export function globToRegExp(pattern: string): RegExp {
  let source = "";
  let index = 0;
  while (index < pattern.length) {
    const char = pattern[index];
    index += 1;
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      const close = pattern.indexOf("]", index + (pattern[index] === "!" ? 2 : 1));
      if (close === -1) {
        source += "\\[";
        continue;
      }
      let body = pattern.slice(index, close);
      index = close + 1;
      if (body.startsWith("!")) {
        body = `^${body.slice(1)}`;
      } else if (body.startsWith("^")) {
        body = `\\${body}`;
      }
      source += `[${body.replaceAll("\\", "\\\\")}]`;
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^(?:${source})$`, "s");
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
