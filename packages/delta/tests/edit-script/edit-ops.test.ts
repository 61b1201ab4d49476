import { describe, expect, it } from "vitest";
import { applyEditOps, countEdits, Edit, editCounts, number, toEditOps } from "../../src/index.js";

const identity = (value: number) => value;

describe("toEditOps", () => {
  it("should cover the whole source with keeps", () => {
    const edits = [new Edit(1, 2, 1, 1), new Edit(4, 4, 3, 4)];
    expect(toEditOps(edits, 4, [1, 3, 4, 5], identity)).toEqual([
      { type: "keep", count: 1 },
      { type: "delete", count: 1 },
      { type: "keep", count: 2 },
      { type: "insert", items: [5] },
    ]);
  });

  it("should emit a trailing keep", () => {
    expect(toEditOps([new Edit(0, 1, 0, 0)], 3, [2, 3], identity)).toEqual([
      { type: "delete", count: 1 },
      { type: "keep", count: 2 },
    ]);
  });

  it("should return an empty script for no edits on an empty source", () => {
    expect(toEditOps([], 0, [], identity)).toEqual([]);
  });

  it("should copy inserted elements", () => {
    const target = [{ id: 1 }];
    const ops = toEditOps([new Edit(0, 0, 0, 1)], 0, target, (item) => ({ ...item }));
    expect(ops).toEqual([{ type: "insert", items: [{ id: 1 }] }]);
    const op = ops[0];
    if (op.type === "insert") {
      expect(op.items[0]).not.toBe(target[0]);
    }
  });
});

describe("applyEditOps", () => {
  const element = number();

  it("should replay keep, delete and insert", () => {
    expect(
      applyEditOps(
        [1, 2, 3],
        [
          { type: "delete", count: 1 },
          { type: "keep", count: 2 },
          { type: "insert", items: [4] },
        ],
        element,
      ),
    ).toEqual({ success: true, value: [2, 3, 4], warnings: [] });
  });

  it("should reject non-positive counts", () => {
    const result = applyEditOps([1], [{ type: "keep", count: 0 }], element);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].message).toBe("Invalid keep count 0 in operation 0 at $");
    }
  });

  it("should reject empty inserts", () => {
    const result = applyEditOps([], [{ type: "insert", items: [] }], element, ["list"]);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].message).toBe("Empty insert in operation 0 at $.list");
    }
  });

  it("should report the failing operation", () => {
    const result = applyEditOps(
      [1, 2],
      [
        { type: "keep", count: 1 },
        { type: "delete", count: 2 },
      ],
      element,
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      const [error] = result.errors;
      expect(error.code).toBe("SEQUENCE_OUT_OF_BOUNDS");
      expect(error.message).toBe(
        "Operation 1 consumes up to element 3 of a 2-element sequence at $",
      );
    }
  });
});

describe("editCounts", () => {
  it("should count deleted and inserted elements apart", () => {
    expect(
      editCounts([
        { type: "delete", count: 2 },
        { type: "keep", count: 1 },
        { type: "insert", items: [7] },
        { type: "delete", count: 1 },
      ]),
    ).toEqual({ deleted: 3, inserted: 1 });
  });
});

describe("countEdits", () => {
  it("should add deleted and inserted elements", () => {
    expect(
      countEdits([
        { type: "keep", count: 5 },
        { type: "delete", count: 2 },
        { type: "insert", items: ["a", "b", "c"] },
      ]),
    ).toBe(5);
  });
});
