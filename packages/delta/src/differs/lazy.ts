import type { Delta, FieldKey } from "../delta/types.js";
import type { Diffable, PatchResult, Shape } from "./diffable.js";

/**
 * Differ resolved on first use, for recursive types.
 *
 * Values must be trees: a value that contains itself makes diff and apply
 * recurse without end.
 *
 * @example
 * ```typescript
 * interface Node { label: string; children: Node[] }
 * const node: Diffable<Node> = struct<Node>({
 *   label: string(),
 *   children: array(lazy(() => node)),
 * });
 * ```
 */
export class LazyDiffer<T> implements Diffable<T> {
  private readonly resolve: () => Diffable<T>;
  private resolved: Diffable<T> | undefined;

  constructor(resolve: () => Diffable<T>) {
    this.resolve = resolve;
  }

  get shape(): Shape {
    return this.target().shape;
  }

  diff(a: T, b: T): Delta<T> {
    return this.target().diff(a, b);
  }

  apply(source: T, delta: Delta, path: readonly FieldKey[] = []): PatchResult<T> {
    return this.target().apply(source, delta, path);
  }

  equals(a: T, b: T): boolean {
    return this.target().equals(a, b);
  }

  is(value: unknown): value is T {
    return this.target().is(value);
  }

  clone(value: T): T {
    return this.target().clone(value);
  }

  private target(): Diffable<T> {
    if (this.resolved === undefined) {
      this.resolved = this.resolve();
    }
    return this.resolved;
  }
}

export function lazy<T>(resolve: () => Diffable<T>): LazyDiffer<T> {
  return new LazyDiffer(resolve);
}
