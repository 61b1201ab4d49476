/**
 * Type of edit region
 */
export enum EditType {
  /** Sequence B has inserted the region. */
  INSERT = "INSERT",

  /** Sequence B has removed the region. */
  DELETE = "DELETE",

  /** Sequence B has replaced the region with different content. */
  REPLACE = "REPLACE",

  /** Sequence A and B have zero length, describing nothing. */
  EMPTY = "EMPTY",
}

/**
 * A modified region between two sequences.
 *
 * An edit covers the modified region only, never a common region. Regions
 * are 0 based and half open: `[beginA, endA)` of sequence A is replaced by
 * `[beginB, endB)` of sequence B.
 */
export class Edit {
  /** Start of region in sequence A; 0 based. */
  beginA: number;

  /** End of region in sequence A; 0 based. */
  endA: number;

  /** Start of region in sequence B; 0 based. */
  beginB: number;

  /** End of region in sequence B; 0 based. */
  endB: number;

  /**
   * @param beginA Start of region in sequence A
   * @param endA End of region in sequence A; must be >= beginA
   * @param beginB Start of region in sequence B
   * @param endB End of region in sequence B; must be >= beginB
   */
  constructor(beginA: number, endA: number, beginB: number, endB: number) {
    this.beginA = beginA;
    this.endA = endA;
    this.beginB = beginB;
    this.endB = endB;
  }

  getType(): EditType {
    if (this.beginA < this.endA) {
      if (this.beginB < this.endB) {
        return EditType.REPLACE;
      }
      return EditType.DELETE;
    }
    if (this.beginB < this.endB) {
      return EditType.INSERT;
    }
    return EditType.EMPTY;
  }

  getLengthA(): number {
    return this.endA - this.beginA;
  }

  getLengthB(): number {
    return this.endB - this.beginB;
  }

  /**
   * Increase endA by 1.
   */
  extendA(): void {
    this.endA++;
  }

  /**
   * Increase endB by 1.
   */
  extendB(): void {
    this.endB++;
  }
}

/**
 * A list of edits, ordered by position.
 */
export type EditList = Edit[];
