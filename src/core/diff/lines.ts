export type DiffRow =
  | { kind: "separator" }
  | { kind: "context"; oldLine: number; newLine: number; text: string }
  | { kind: "removed"; oldLine: number; text: string }
  | { kind: "added"; newLine: number; text: string };

type EditOp =
  | { kind: "equal"; oldIndex: number; newIndex: number }
  | { kind: "delete"; oldIndex: number }
  | { kind: "insert"; newIndex: number };

/** One aligned position of the side-by-side view; either side may be missing. */
type LinePair = {
  oldIndex?: number;
  newIndex?: number;
  changed: boolean;
};

export const DEFAULT_CONTEXT_LINES = 3;

/**
 * Line-aligned diff of two texts. Lines are compared without surrounding
 * whitespace; rows keep the original indentation. Only `context` unchanged
 * lines around each change are kept, with a separator wherever lines were skipped.
 */
export function computeLineDiff(fromText: string, toText: string, context = DEFAULT_CONTEXT_LINES): DiffRow[] {
  const fromLines = splitLines(fromText);
  const toLines = splitLines(toText);
  const ops = diffSequences(
    fromLines.map((line) => line.trim()),
    toLines.map((line) => line.trim())
  );
  const pairs = pairEdits(ops);
  const visible = selectVisible(pairs, context);

  const rows: DiffRow[] = [];
  let previous = -1;
  for (const index of visible) {
    if (index !== previous + 1) {
      rows.push({ kind: "separator" });
    }
    previous = index;

    const pair = pairs[index];
    if (pair.oldIndex !== undefined && pair.newIndex !== undefined && !pair.changed) {
      rows.push({
        kind: "context",
        oldLine: pair.oldIndex + 1,
        newLine: pair.newIndex + 1,
        text: displayLine(toLines[pair.newIndex]),
      });
      continue;
    }
    if (pair.oldIndex !== undefined) {
      rows.push({ kind: "removed", oldLine: pair.oldIndex + 1, text: displayLine(fromLines[pair.oldIndex]) });
    }
    if (pair.newIndex !== undefined) {
      rows.push({ kind: "added", newLine: pair.newIndex + 1, text: displayLine(toLines[pair.newIndex]) });
    }
  }
  return rows;
}

/** Splits on `\n`, `\r\n` or `\r`; a trailing line break does not start another line. */
export function splitLines(text: string): string[] {
  if (text === "") {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/** Leading blanks and tabs of the original line, then its trimmed content. */
export function displayLine(line: string): string {
  const leading = /^[ \t]*/.exec(line)?.[0] ?? "";
  return `${leading}${line.trim()}`;
}

/**
 * Myers shortest edit script between two sequences, in linear space: each
 * range is split at a point of an optimal path found by searching from both
 * ends at once, then both halves are diffed on their own.
 */
export function diffSequences(a: readonly string[], b: readonly string[]): EditOp[] {
  const ops: EditOp[] = [];
  diffRange(a, 0, a.length, b, 0, b.length, ops);
  return ops;
}

function diffRange(
  a: readonly string[],
  aStart: number,
  aEnd: number,
  b: readonly string[],
  bStart: number,
  bEnd: number,
  ops: EditOp[]
): void {
  while (aStart < aEnd && bStart < bEnd && a[aStart] === b[bStart]) {
    ops.push({ kind: "equal", oldIndex: aStart, newIndex: bStart });
    aStart += 1;
    bStart += 1;
  }
  let suffix = 0;
  while (aEnd - suffix > aStart && bEnd - suffix > bStart && a[aEnd - suffix - 1] === b[bEnd - suffix - 1]) {
    suffix += 1;
  }
  const aStop = aEnd - suffix;
  const bStop = bEnd - suffix;

  const split = aStart < aStop && bStart < bStop ? findSplit(a, aStart, aStop, b, bStart, bStop) : undefined;
  if (split) {
    diffRange(a, aStart, split.x, b, bStart, split.y, ops);
    diffRange(a, split.x, aStop, b, split.y, bStop, ops);
  } else {
    for (let index = aStart; index < aStop; index += 1) {
      ops.push({ kind: "delete", oldIndex: index });
    }
    for (let index = bStart; index < bStop; index += 1) {
      ops.push({ kind: "insert", newIndex: index });
    }
  }

  for (let offset = 0; offset < suffix; offset += 1) {
    ops.push({ kind: "equal", oldIndex: aStop + offset, newIndex: bStop + offset });
  }
}

/**
 * Runs the forward and reverse searches until their paths overlap and returns
 * the overlap as absolute indexes. Undefined when the ranges share no line.
 */
function findSplit(
  a: readonly string[],
  aStart: number,
  aEnd: number,
  b: readonly string[],
  bStart: number,
  bEnd: number
): { x: number; y: number } | undefined {
  const n = aEnd - aStart;
  const m = bEnd - bStart;
  const maxD = Math.ceil((n + m) / 2);
  const offset = maxD;
  const size = 2 * maxD + 2;
  const forward = new Array<number>(size).fill(-1);
  const reverse = new Array<number>(size).fill(-1);
  forward[offset + 1] = 0;
  reverse[offset + 1] = 0;
  const delta = n - m;
  const checkForward = delta % 2 !== 0;
  // diagonals that ran off the grid are not searched again
  let forwardStart = 0;
  let forwardEnd = 0;
  let reverseStart = 0;
  let reverseEnd = 0;

  const accept = (x: number, y: number): { x: number; y: number } | undefined => {
    const split = { x: aStart + x, y: bStart + y };
    const atStart = x === 0 && y === 0;
    const atEnd = x === n && y === m;
    return atStart || atEnd ? undefined : split;
  };

  for (let d = 0; d < maxD; d += 1) {
    for (let k = -d + forwardStart; k <= d - forwardEnd; k += 2) {
      const index = offset + k;
      let x = k === -d || (k !== d && forward[index - 1] < forward[index + 1]) ? forward[index + 1] : forward[index - 1] + 1;
      let y = x - k;
      while (x < n && y < m && a[aStart + x] === b[bStart + y]) {
        x += 1;
        y += 1;
      }
      forward[index] = x;
      if (x > n) {
        forwardEnd += 2;
      } else if (y > m) {
        forwardStart += 2;
      } else if (checkForward) {
        const reverseIndex = offset + delta - k;
        if (reverseIndex >= 0 && reverseIndex < size && reverse[reverseIndex] !== -1 && x >= n - reverse[reverseIndex]) {
          return accept(x, y);
        }
      }
    }

    for (let k = -d + reverseStart; k <= d - reverseEnd; k += 2) {
      const index = offset + k;
      let x = k === -d || (k !== d && reverse[index - 1] < reverse[index + 1]) ? reverse[index + 1] : reverse[index - 1] + 1;
      let y = x - k;
      while (x < n && y < m && a[aEnd - x - 1] === b[bEnd - y - 1]) {
        x += 1;
        y += 1;
      }
      reverse[index] = x;
      if (x > n) {
        reverseEnd += 2;
      } else if (y > m) {
        reverseStart += 2;
      } else if (!checkForward) {
        const forwardIndex = offset + delta - k;
        if (forwardIndex >= 0 && forwardIndex < size && forward[forwardIndex] !== -1) {
          const forwardX = forward[forwardIndex];
          if (forwardX >= n - x) {
            return accept(forwardX, offset + forwardX - forwardIndex);
          }
        }
      }
    }
  }
  return undefined;
}

/**
 * Turns an edit script into side-by-side positions: within each block of
 * changes the n-th removed line sits next to the n-th inserted line.
 */
function pairEdits(ops: EditOp[]): LinePair[] {
  const pairs: LinePair[] = [];
  let deletes: number[] = [];
  let inserts: number[] = [];

  const flush = (): void => {
    const paired = Math.min(deletes.length, inserts.length);
    for (let index = 0; index < paired; index += 1) {
      pairs.push({ oldIndex: deletes[index], newIndex: inserts[index], changed: true });
    }
    for (const oldIndex of deletes.slice(paired)) {
      pairs.push({ oldIndex, changed: true });
    }
    for (const newIndex of inserts.slice(paired)) {
      pairs.push({ newIndex, changed: true });
    }
    deletes = [];
    inserts = [];
  };

  for (const op of ops) {
    if (op.kind === "delete") {
      deletes.push(op.oldIndex);
    } else if (op.kind === "insert") {
      inserts.push(op.newIndex);
    } else {
      flush();
      pairs.push({ oldIndex: op.oldIndex, newIndex: op.newIndex, changed: false });
    }
  }
  flush();
  return pairs;
}

function selectVisible(pairs: LinePair[], context: number): number[] {
  const keep = new Array<boolean>(pairs.length).fill(false);
  pairs.forEach((pair, index) => {
    if (!pair.changed) {
      return;
    }
    const start = Math.max(0, index - context);
    const end = Math.min(pairs.length - 1, index + context);
    for (let cursor = start; cursor <= end; cursor += 1) {
      keep[cursor] = true;
    }
  });
  const visible: number[] = [];
  keep.forEach((kept, index) => {
    if (kept) {
      visible.push(index);
    }
  });
  return visible;
}
