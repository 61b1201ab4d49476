import { describeValue } from "../common/guards.js";
import { errSingle, mapResult, ok } from "../common/result.js";
import { noChange, sameVariant, variantChanged } from "../delta/builders.js";
import type { Delta, FieldKey } from "../delta/types.js";
import { ShapeMismatchError } from "../errors/patch-errors.js";
import { applyWhole, unsupportedDelta } from "../patch/apply-common.js";
import type { Diffable, PatchResult, ProductDiffable } from "./diffable.js";

/**
 * One variant of a sum type: how to read its payload out of a value and
 * how to build a value back from a payload.
 */
export interface VariantCase<T, P> {
  readonly payload: ProductDiffable<P>;
  /** Payload of `value`, or `undefined` when `value` holds another variant. */
  extract(value: T): P | undefined;
  construct(payload: P): T;
}

export function variant<T, P>(
  payload: ProductDiffable<P>,
  extract: (value: T) => P | undefined,
  construct: (payload: P) => T,
): VariantCase<T, P> {
  return { payload, extract, construct };
}

export interface SumOptions<T> {
  /** Tag of the active variant; must be a key of `variants`. */
  tagOf(value: T): string;
  /** Shape guard for the whole union. */
  is(value: unknown): value is T;
  variants: Readonly<Record<string, VariantCase<T, unknown>>>;
}

/**
 * Differ for tagged unions.
 *
 * A change of variant is carried whole (`variant` delta with the new
 * payload). Within one variant the payload is diffed as a product and
 * wrapped in a `same-variant` delta naming that variant, so it is only ever
 * applied to a value holding the same variant.
 */
export class SumDiffer<T> implements Diffable<T> {
  readonly shape = "sum";

  private readonly options: SumOptions<T>;
  private readonly cases: ReadonlyMap<string, VariantCase<T, unknown>>;

  constructor(options: SumOptions<T>) {
    this.options = options;
    this.cases = new Map(Object.entries(options.variants));
  }

  get tags(): string[] {
    return [...this.cases.keys()];
  }

  diff(a: T, b: T): Delta<T> {
    const tagA = this.options.tagOf(a);
    const tagB = this.options.tagOf(b);
    const caseB = this.caseOf(tagB);
    if (tagA !== tagB) {
      return variantChanged(tagB, caseB.payload.clone(this.payloadOf(caseB, tagB, b)));
    }
    const inner = caseB.payload.diffFields(
      this.payloadOf(caseB, tagA, a),
      this.payloadOf(caseB, tagB, b),
    );
    return inner.type === "unchanged" ? noChange() : sameVariant(tagB, inner);
  }

  apply(source: T, delta: Delta, path: readonly FieldKey[] = []): PatchResult<T> {
    const whole = applyWhole(this, source, delta, path);
    if (whole) {
      return whole;
    }

    switch (delta.type) {
      case "variant": {
        const target = this.cases.get(delta.tag);
        if (!target) {
          return errSingle(
            new ShapeMismatchError(
              path,
              `one of variants ${this.tags.join(", ")}`,
              delta.tag,
              `Unknown variant ${delta.tag}`,
            ),
          );
        }
        const payload = delta.payload;
        if (!target.payload.is(payload)) {
          return errSingle(
            new ShapeMismatchError(
              path,
              `payload of ${delta.tag}`,
              describeValue(payload),
              `Payload does not fit variant ${delta.tag}`,
            ),
          );
        }
        return ok(target.construct(target.payload.clone(payload)));
      }
      case "same-variant": {
        const tag = this.options.tagOf(source);
        if (tag !== delta.tag) {
          return errSingle(
            new ShapeMismatchError(
              path,
              `variant ${delta.tag}`,
              `variant ${tag}`,
              `Delta for variant ${delta.tag} applied to variant ${tag}`,
            ),
          );
        }
        const active = this.caseOf(tag);
        const payload = this.payloadOf(active, tag, source);
        const patched = active.payload.apply(payload, delta.fields, path);
        return mapResult(patched, (next) => active.construct(next));
      }
      default:
        return unsupportedDelta(this.shape, delta, path);
    }
  }

  equals(a: T, b: T): boolean {
    const tag = this.options.tagOf(a);
    if (tag !== this.options.tagOf(b)) {
      return false;
    }
    const active = this.caseOf(tag);
    return active.payload.equals(this.payloadOf(active, tag, a), this.payloadOf(active, tag, b));
  }

  is(value: unknown): value is T {
    return this.options.is(value);
  }

  clone(value: T): T {
    const tag = this.options.tagOf(value);
    const active = this.caseOf(tag);
    return active.construct(active.payload.clone(this.payloadOf(active, tag, value)));
  }

  private caseOf(tag: string): VariantCase<T, unknown> {
    const found = this.cases.get(tag);
    if (!found) {
      throw new Error(`Unknown variant ${tag}: tagOf must return one of ${this.tags.join(", ")}`);
    }
    return found;
  }

  private payloadOf(active: VariantCase<T, unknown>, tag: string, value: T): unknown {
    const payload = active.extract(value);
    if (payload === undefined) {
      throw new Error(`Variant ${tag} cannot extract a payload from the value its tag names`);
    }
    return payload;
  }
}

/**
 * Differ for a tagged union, built from one case per variant.
 *
 * @example
 * ```typescript
 * type Shape = { kind: "circle"; r: number } | { kind: "square"; side: number };
 * const shape = sum<Shape>({
 *   tagOf: (value) => value.kind,
 *   is: isShape,
 *   variants: {
 *     circle: variant<Shape, { r: number }>(
 *       struct<{ r: number }>({ r: number() }),
 *       (value) => (value.kind === "circle" ? { r: value.r } : undefined),
 *       ({ r }) => ({ kind: "circle", r }),
 *     ),
 *     square: variant<Shape, { side: number }>(
 *       struct<{ side: number }>({ side: number() }),
 *       (value) => (value.kind === "square" ? { side: value.side } : undefined),
 *       ({ side }) => ({ kind: "square", side }),
 *     ),
 *   },
 * });
 * ```
 */
export function sum<T>(options: SumOptions<T>): SumDiffer<T> {
  return new SumDiffer<T>(options);
}
