import { describe, expect, it } from "vitest";
import { nullable, number, optional, struct } from "../../src/index.js";
import { createDiffableTests } from "../suites/diffable.suite.js";

const maybeCount = optional(number());
const maybePoint = nullable(struct<{ x: number; y: number }>({ x: number(), y: number() }));

createDiffableTests("optional", maybeCount, [undefined, 0, 5]);
createDiffableTests("nullable", maybePoint, [null, { x: 0, y: 0 }, { x: 0, y: 1 }]);

describe("optional and nullable", () => {
  it("should report unchanged when both values are absent", () => {
    expect(maybeCount.diff(undefined, undefined)).toEqual({ type: "unchanged" });
    expect(maybePoint.diff(null, null)).toEqual({ type: "unchanged" });
  });

  it("should replace on a change of presence", () => {
    expect(maybeCount.diff(undefined, 3)).toEqual({ type: "replace", value: 3 });
    expect(maybeCount.diff(3, undefined)).toEqual({ type: "replace", value: undefined });
    expect(maybePoint.diff(null, { x: 1, y: 2 })).toEqual({
      type: "replace",
      value: { x: 1, y: 2 },
    });
  });

  it("should pass the inner delta through between present values", () => {
    expect(maybeCount.diff(1, 2)).toEqual({ type: "replace", value: 2 });
    expect(maybePoint.diff({ x: 1, y: 2 }, { x: 1, y: 3 })).toEqual({
      type: "fields",
      fields: [{ field: "y", delta: { type: "replace", value: 3 } }],
    });
  });

  it("should reject a structural delta on an absent value", () => {
    const result = maybePoint.apply(null, {
      type: "fields",
      fields: [{ field: "y", delta: { type: "replace", value: 3 } }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].code).toBe("SHAPE_MISMATCH");
      expect(result.errors[0].message).toBe("Delta of kind fields applied to an absent value at $");
    }
  });

  it("should tell the two absent values apart", () => {
    expect(maybeCount.is(undefined)).toBe(true);
    expect(maybeCount.is(null)).toBe(false);
    expect(maybePoint.is(null)).toBe(true);
    expect(maybePoint.is(undefined)).toBe(false);
  });
});
