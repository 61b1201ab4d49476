/**
 * Parametrized conformance suite for differs
 *
 * Every differ must satisfy the same contract over any pair of its values:
 * applying `diff(a, b)` to `a` rebuilds `b`, `diff(a, a)` is unchanged,
 * and neither operation touches its inputs.
 */

import { describe, expect, it } from "vitest";
import type { Diffable } from "../../src/index.js";
import { testLog } from "../test-logger.js";

/**
 * Create the conformance tests for one differ
 *
 * @param name Name of the differ under test
 * @param differ The differ
 * @param samples Values of the differ's type; every ordered pair is checked
 */
export function createDiffableTests<T>(name: string, differ: Diffable<T>, samples: T[]): void {
  describe(`Diffable [${name}]`, () => {
    const pairs: [T, T][] = [];
    for (const a of samples) {
      for (const b of samples) {
        pairs.push([a, b]);
      }
    }

    it("should rebuild the target from the source and the delta", () => {
      for (const [a, b] of pairs) {
        const delta = differ.diff(a, b);
        testLog(name, delta);
        const result = differ.apply(a, delta);
        expect(result.success).toBe(true);
        if (result.success) {
          expect(differ.equals(result.value, b)).toBe(true);
        }
      }
    });

    it("should report no change between a value and itself", () => {
      for (const value of samples) {
        expect(differ.diff(value, value)).toEqual({ type: "unchanged" });
        expect(differ.diff(value, differ.clone(value))).toEqual({ type: "unchanged" });
      }
    });

    it("should produce the same delta for the same inputs", () => {
      for (const [a, b] of pairs) {
        expect(differ.diff(a, b)).toEqual(differ.diff(a, b));
      }
    });

    it("should leave source and target untouched", () => {
      for (const [a, b] of pairs) {
        const before = differ.clone(a);
        const after = differ.clone(b);
        differ.apply(a, differ.diff(a, b));
        expect(differ.equals(a, before)).toBe(true);
        expect(differ.equals(b, after)).toBe(true);
      }
    });

    it("should accept its own values and clones", () => {
      for (const value of samples) {
        expect(differ.is(value)).toBe(true);
        expect(differ.equals(differ.clone(value), value)).toBe(true);
      }
    });
  });
}
