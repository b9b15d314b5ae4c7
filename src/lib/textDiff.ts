export type DiffLine =
  | {
      type: "context" | "add" | "del";
      oldLineNumber: number | null;
      newLineNumber: number | null;
      text: string;
    }
  | {
      type: "skip";
      hiddenOldLines: number;
      hiddenNewLines: number;
    };

export interface UnifiedDiff {
  lines: DiffLine[];
  addedLines: number;
  removedLines: number;
  changed: boolean;
}

export interface UnifiedDiffOptions {
  /** Unchanged lines kept around each change; omit to keep all of them. */
  contextLines?: number;
}

type RawOp = { type: "context" | "add" | "del"; oldIndex: number; newIndex: number; text: string };

// Above this many DP cells the changed middle is reported as one replace block.
const MAX_LCS_CELLS = 4_000_000;

const splitLines = (text: string): string[] => {
  if (!text) return [];
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
};

const diffMiddle = (a: string[], b: string[], oldOffset: number, newOffset: number): RawOp[] => {
  const ops: RawOp[] = [];
  const n = a.length;
  const m = b.length;

  if (n * m > MAX_LCS_CELLS) {
    a.forEach((text, i) => ops.push({ type: "del", oldIndex: oldOffset + i, newIndex: -1, text }));
    b.forEach((text, j) => ops.push({ type: "add", oldIndex: -1, newIndex: newOffset + j, text }));
    return ops;
  }

  // lcs[i * (m + 1) + j] = LCS length of a[i..] and b[j..]
  const width = m + 1;
  const lcs = new Uint32Array((n + 1) * width);
  for (let i = n - 1; i >= 0; i -= 1) {
    for (let j = m - 1; j >= 0; j -= 1) {
      lcs[i * width + j] =
        a[i] === b[j]
          ? (lcs[(i + 1) * width + j + 1] ?? 0) + 1
          : Math.max(lcs[(i + 1) * width + j] ?? 0, lcs[i * width + j + 1] ?? 0);
    }
  }

  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    const left = a[i];
    const right = b[j];
    if (left !== undefined && right !== undefined && left === right) {
      ops.push({ type: "context", oldIndex: oldOffset + i, newIndex: newOffset + j, text: left });
      i += 1;
      j += 1;
    } else if (left !== undefined && (right === undefined || (lcs[(i + 1) * width + j] ?? 0) >= (lcs[i * width + j + 1] ?? 0))) {
      ops.push({ type: "del", oldIndex: oldOffset + i, newIndex: -1, text: left });
      i += 1;
    } else if (right !== undefined) {
      ops.push({ type: "add", oldIndex: -1, newIndex: newOffset + j, text: right });
      j += 1;
    }
  }

  return ops;
};

const computeOps = (a: string[], b: string[]): RawOp[] => {
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
    prefix += 1;
  }

  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix += 1;
  }

  const ops: RawOp[] = [];
  for (let k = 0; k < prefix; k += 1) {
    ops.push({ type: "context", oldIndex: k, newIndex: k, text: a[k] ?? "" });
  }

  ops.push(...diffMiddle(a.slice(prefix, a.length - suffix), b.slice(prefix, b.length - suffix), prefix, prefix));

  for (let k = suffix; k > 0; k -= 1) {
    const oldIndex = a.length - k;
    const newIndex = b.length - k;
    ops.push({ type: "context", oldIndex, newIndex, text: a[oldIndex] ?? "" });
  }

  return ops;
};

const toLine = (op: RawOp): DiffLine => ({
  type: op.type,
  oldLineNumber: op.oldIndex >= 0 ? op.oldIndex + 1 : null,
  newLineNumber: op.newIndex >= 0 ? op.newIndex + 1 : null,
  text: op.text
});

export const buildUnifiedDiff = (fromText: string, toText: string, options: UnifiedDiffOptions = {}): UnifiedDiff => {
  const ops = computeOps(splitLines(fromText), splitLines(toText));
  const addedLines = ops.filter((op) => op.type === "add").length;
  const removedLines = ops.filter((op) => op.type === "del").length;
  const changed = addedLines > 0 || removedLines > 0;

  const contextLines = options.contextLines;
  if (contextLines === undefined) {
    return { lines: ops.map(toLine), addedLines, removedLines, changed };
  }

  const keep = ops.map((op) => op.type !== "context");
  ops.forEach((op, index) => {
    if (op.type === "context") return;
    const from = Math.max(0, index - contextLines);
    const to = Math.min(ops.length - 1, index + contextLines);
    for (let k = from; k <= to; k += 1) {
      keep[k] = true;
    }
  });

  const lines: DiffLine[] = [];
  let hidden = 0;
  const flushSkip = (): void => {
    if (hidden === 0) return;
    lines.push({ type: "skip", hiddenOldLines: hidden, hiddenNewLines: hidden });
    hidden = 0;
  };

  ops.forEach((op, index) => {
    if (!keep[index]) {
      hidden += 1;
      return;
    }
    flushSkip();
    lines.push(toLine(op));
  });
  flushSkip();

  return { lines, addedLines, removedLines, changed };
};
