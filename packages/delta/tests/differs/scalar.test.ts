import { describe, expect, it } from "vitest";
import { bigint, boolean, date, literal, number, scalar, string, unit } from "../../src/index.js";
import { createDiffableTests } from "../suites/diffable.suite.js";

createDiffableTests("string", string(), ["", "a", "hello"]);
createDiffableTests("number", number(), [0, -1, 2.5, Number.NaN]);
createDiffableTests("boolean", boolean(), [true, false]);
createDiffableTests("bigint", bigint(), [0n, 10n]);
createDiffableTests("date", date(), [new Date(0), new Date(86_400_000)]);
createDiffableTests("literal", literal("low", "high"), ["low", "high"]);

describe("scalar differs", () => {
  it("should report unchanged for equal values", () => {
    expect(number().diff(3, 3)).toEqual({ type: "unchanged" });
    expect(string().diff("a", "a")).toEqual({ type: "unchanged" });
  });

  it("should replace changed values whole", () => {
    expect(number().diff(1, 2)).toEqual({ type: "replace", value: 2 });
    expect(string().diff("a", "b")).toEqual({ type: "replace", value: "b" });
  });

  it("should treat NaN as equal to itself and 0 as different from -0", () => {
    expect(number().diff(Number.NaN, Number.NaN)).toEqual({ type: "unchanged" });
    expect(number().diff(0, -0)).toEqual({ type: "replace", value: -0 });
  });

  it("should compare dates by time and copy them into deltas", () => {
    const differ = date();
    expect(differ.diff(new Date(1000), new Date(1000))).toEqual({ type: "unchanged" });

    const target = new Date(2000);
    const delta = differ.diff(new Date(1000), target);
    expect(delta.type).toBe("replace");
    if (delta.type === "replace") {
      expect(delta.value).not.toBe(target);
      expect(delta.value).toEqual(target);
    }
  });

  it("should apply replace and unchanged deltas", () => {
    const differ = number();
    expect(differ.apply(1, { type: "replace", value: 5 })).toEqual({
      success: true,
      value: 5,
      warnings: [],
    });
    expect(differ.apply(1, { type: "unchanged" })).toEqual({
      success: true,
      value: 1,
      warnings: [],
    });
  });

  it("should reject a replacement of the wrong type", () => {
    const result = number().apply(1, { type: "replace", value: "x" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe("SHAPE_MISMATCH");
      expect(result.errors[0].message).toBe(
        "Replacement value does not fit the scalar shape at $",
      );
    }
  });

  it("should reject structured deltas", () => {
    const result = string().apply("a", { type: "fields", fields: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].message).toBe(
        "Shape mismatch: expected scalar delta, got fields delta at $",
      );
    }
  });

  it("should accept only listed literals", () => {
    const level = literal("low", "high");
    expect(level.is("low")).toBe(true);
    expect(level.is("medium")).toBe(false);
    expect(level.apply("low", { type: "replace", value: "medium" }).success).toBe(false);
  });

  it("should never change the unit value", () => {
    expect(unit().diff(null, null)).toEqual({ type: "unchanged" });
    expect(unit().is(undefined)).toBe(false);
  });

  it("should use custom equality and copy", () => {
    const tags = scalar((value): value is string[] => Array.isArray(value), {
      equals: (a, b) => a.join(",") === b.join(","),
      clone: (value) => [...value],
    });
    const target = ["a", "b"];
    const delta = tags.diff(["a"], target);
    expect(delta).toEqual({ type: "replace", value: ["a", "b"] });
    if (delta.type === "replace") {
      expect(delta.value).not.toBe(target);
    }
    expect(tags.diff(["a", "b"], ["a", "b"])).toEqual({ type: "unchanged" });
  });
});
