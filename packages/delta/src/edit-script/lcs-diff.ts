import type { DeltaLogger } from "../common/logger.js";
import { Edit, type EditList } from "./edit.js";

/**
 * Default bound on the number of cells of the LCS table (64 MiB of
 * `Uint32Array`).
 */
export const DEFAULT_MAX_LCS_CELLS = 1 << 24;

export interface LcsDiffOptions {
  /** Largest LCS table, in cells, the diff may allocate. */
  maxCells?: number;
  logger?: DeltaLogger;
}

/**
 * Longest-common-subsequence diff with whole-element matching.
 *
 * Produces an edit list of minimal total size (deleted plus inserted
 * elements). The common prefix and suffix are matched first; the middle is
 * aligned with an `(n+1)·(m+1)` table of suffix LCS lengths and walked from
 * the start. Where deleting and inserting cost the same, the walk deletes
 * first, so regions always read "delete, then insert".
 */
export class LcsDiff {
  /**
   * Compute the edits turning `a` into `b`.
   *
   * @param a The first (old) sequence
   * @param b The second (new) sequence
   * @param equals Element equality
   * @returns the edit list, or `undefined` when the table would exceed
   *   `maxCells`
   */
  static diff<E>(
    a: readonly E[],
    b: readonly E[],
    equals: (x: E, y: E) => boolean,
    options: LcsDiffOptions = {},
  ): EditList | undefined {
    const maxCells = options.maxCells ?? DEFAULT_MAX_LCS_CELLS;

    let prefix = 0;
    const shortest = Math.min(a.length, b.length);
    while (prefix < shortest && equals(a[prefix], b[prefix])) {
      prefix++;
    }
    let suffix = 0;
    while (
      suffix < shortest - prefix &&
      equals(a[a.length - 1 - suffix], b[b.length - 1 - suffix])
    ) {
      suffix++;
    }

    const n = a.length - prefix - suffix;
    const m = b.length - prefix - suffix;
    if (n === 0 && m === 0) {
      return [];
    }
    if (n === 0 || m === 0) {
      return [new Edit(prefix, prefix + n, prefix, prefix + m)];
    }

    const cells = (n + 1) * (m + 1);
    if (cells > maxCells) {
      options.logger?.debug?.(`LCS table of ${cells} cells exceeds the limit of ${maxCells}`);
      return undefined;
    }
    options.logger?.debug?.(`LCS table ${n + 1}x${m + 1} after ${prefix} common leading elements`);

    const table = new LcsTable(a, b, prefix, n, m, equals);
    const edits: EditList = [];
    let current: Edit | null = null;
    let i = 0;
    let j = 0;
    while (i < n || j < m) {
      if (i < n && j < m && equals(a[prefix + i], b[prefix + j])) {
        current = null;
        i++;
        j++;
        continue;
      }
      if (current === null) {
        current = new Edit(prefix + i, prefix + i, prefix + j, prefix + j);
        edits.push(current);
      }
      if (j >= m || (i < n && table.at(i + 1, j) >= table.at(i, j + 1))) {
        current.extendA();
        i++;
      } else {
        current.extendB();
        j++;
      }
    }
    return edits;
  }
}

/**
 * Suffix LCS lengths: `at(i, j)` is the LCS length of `a[i..n)` and
 * `b[j..m)`, offsets relative to the trimmed middle.
 */
class LcsTable<E> {
  private readonly width: number;
  private readonly cells: Uint32Array;

  constructor(
    a: readonly E[],
    b: readonly E[],
    offset: number,
    n: number,
    m: number,
    equals: (x: E, y: E) => boolean,
  ) {
    this.width = m + 1;
    this.cells = new Uint32Array((n + 1) * (m + 1));
    for (let i = n - 1; i >= 0; i--) {
      for (let j = m - 1; j >= 0; j--) {
        this.cells[i * this.width + j] = equals(a[offset + i], b[offset + j])
          ? this.at(i + 1, j + 1) + 1
          : Math.max(this.at(i + 1, j), this.at(i, j + 1));
      }
    }
  }

  at(i: number, j: number): number {
    return this.cells[i * this.width + j];
  }
}
