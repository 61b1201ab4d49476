import { describe, expect, it, vi } from "vitest";
import {
  apply,
  applyOrThrow,
  array,
  diff,
  number,
  PatchFailedError,
  ShapeMismatchError,
  string,
  struct,
} from "../../src/index.js";

interface Doc {
  title: string;
  version: number;
  lines: string[];
}

const doc = struct<Doc>({ title: string(), version: number(), lines: array(string()) });

const v1: Doc = { title: "notes", version: 1, lines: ["a", "b", "c"] };
const v2: Doc = { title: "notes", version: 2, lines: ["a", "c", "d"] };

describe("patch engine", () => {
  it("should rebuild the target from the source and the delta", () => {
    const delta = diff(doc, v1, v2);
    expect(apply(doc, v1, delta)).toEqual({ success: true, value: v2, warnings: [] });
  });

  it("should keep deltas valid after the inputs change", () => {
    const source: Doc = { title: "notes", version: 1, lines: ["a"] };
    const target: Doc = { title: "notes", version: 1, lines: ["a", "b"] };
    const delta = diff(doc, source, target);
    target.lines.push("c");
    expect(applyOrThrow(doc, source, delta)).toEqual({
      title: "notes",
      version: 1,
      lines: ["a", "b"],
    });
  });

  it("should throw the collected errors from applyOrThrow", () => {
    const delta = diff(doc, v1, v2);
    const other: Doc = { title: "notes", version: 1, lines: [] };
    expect(() => applyOrThrow(doc, other, delta)).toThrow(PatchFailedError);
    expect(() => applyOrThrow(doc, other, delta)).toThrow(
      "Patch failed: Operation 0 consumes up to element 1 of a 0-element sequence at $.lines",
    );
  });

  it("should expose typed errors on failure", () => {
    const result = apply(doc, v1, { type: "variant", tag: "x", payload: null });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0]).toBeInstanceOf(ShapeMismatchError);
      expect(result.errors[0].path).toEqual([]);
    }
  });

  it("should log failures at debug level", () => {
    const debug = vi.fn();
    apply(doc, v1, { type: "edits", ops: [] }, { logger: { debug } });
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toBe("Patch of product value failed");
  });
});
