import { describe, expect, it, vi } from "vitest";
import { array, type Diffable, lazy, number, string, struct } from "../../src/index.js";
import { createDiffableTests } from "../suites/diffable.suite.js";

interface TreeNode {
  label: string;
  children: TreeNode[];
}

const treeNode: Diffable<TreeNode> = struct<TreeNode>({
  label: string(),
  children: array(lazy(() => treeNode)),
});

const leaf = (label: string): TreeNode => ({ label, children: [] });

createDiffableTests("recursive struct", treeNode, [
  leaf("root"),
  { label: "root", children: [leaf("a")] },
  { label: "root", children: [leaf("a"), { label: "b", children: [leaf("c")] }] },
]);

describe("lazy", () => {
  it("should describe recursive types", () => {
    const delta = treeNode.diff(
      { label: "root", children: [leaf("a")] },
      { label: "top", children: [leaf("a")] },
    );
    expect(delta).toEqual({
      type: "fields",
      fields: [{ field: "label", delta: { type: "replace", value: "top" } }],
    });
  });

  it("should resolve the differ once, on first use", () => {
    const resolve = vi.fn(() => number());
    const deferred = lazy(resolve);
    expect(resolve).not.toHaveBeenCalled();
    expect(deferred.shape).toBe("scalar");
    expect(deferred.diff(1, 2)).toEqual({ type: "replace", value: 2 });
    expect(resolve).toHaveBeenCalledTimes(1);
  });
});
