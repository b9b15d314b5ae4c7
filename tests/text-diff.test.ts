import { describe, expect, it } from "vitest";
import { buildUnifiedDiff } from "../src/lib/textDiff.js";

describe("buildUnifiedDiff", () => {
  it("reports a single-line replacement as one removal and one addition", () => {
    const diff = buildUnifiedDiff("Hello", "World");
    expect(diff.lines).toEqual([
      { type: "del", oldLineNumber: 1, newLineNumber: null, text: "Hello" },
      { type: "add", oldLineNumber: null, newLineNumber: 1, text: "World" }
    ]);
    expect(diff.addedLines).toBe(1);
    expect(diff.removedLines).toBe(1);
    expect(diff.changed).toBe(true);
  });

  it("keeps unchanged lines as context with both line numbers", () => {
    const diff = buildUnifiedDiff("a\nb\nc", "a\nB\nc");
    expect(diff.lines).toEqual([
      { type: "context", oldLineNumber: 1, newLineNumber: 1, text: "a" },
      { type: "del", oldLineNumber: 2, newLineNumber: null, text: "b" },
      { type: "add", oldLineNumber: null, newLineNumber: 2, text: "B" },
      { type: "context", oldLineNumber: 3, newLineNumber: 3, text: "c" }
    ]);
  });

  it("finds insertions in the middle without touching surrounding lines", () => {
    const diff = buildUnifiedDiff("one\ntwo\nfour", "one\ntwo\nthree\nfour");
    expect(diff.addedLines).toBe(1);
    expect(diff.removedLines).toBe(0);
    expect(diff.lines[2]).toEqual({ type: "add", oldLineNumber: null, newLineNumber: 3, text: "three" });
  });

  it("collapses distant context into skip markers", () => {
    const before = ["l1", "l2", "l3", "l4", "l5", "l6", "l7", "l8"].join("\n");
    const after = ["l1", "l2", "l3", "l4", "l5", "l6", "l7", "L8"].join("\n");
    const diff = buildUnifiedDiff(before, after, { contextLines: 2 });
    expect(diff.lines).toEqual([
      { type: "skip", hiddenOldLines: 5, hiddenNewLines: 5 },
      { type: "context", oldLineNumber: 6, newLineNumber: 6, text: "l6" },
      { type: "context", oldLineNumber: 7, newLineNumber: 7, text: "l7" },
      { type: "del", oldLineNumber: 8, newLineNumber: null, text: "l8" },
      { type: "add", oldLineNumber: null, newLineNumber: 8, text: "L8" }
    ]);
  });

  it("marks identical bodies as unchanged", () => {
    const diff = buildUnifiedDiff("same\ntext\n", "same\ntext");
    expect(diff.changed).toBe(false);
    expect(diff.lines.every((line) => line.type === "context")).toBe(true);
  });

  it("treats an empty body as zero lines", () => {
    const diff = buildUnifiedDiff("", "first");
    expect(diff.lines).toEqual([{ type: "add", oldLineNumber: null, newLineNumber: 1, text: "first" }]);
  });
});
