/**
 * Rejection Region
 *
 * A subset of the outcome space: "reject the null when the observed outcome
 * is in this set". Stored canonically as the ascending outcome indices and
 * the matching indicator bitmask, which also gives regions a total order.
 */

import { InvalidInputError } from '../errors';

/**
 * Largest outcome space a region can index (bitmasks stay within 31-bit integers)
 */
export const MAX_OUTCOMES = 30;

export class Region {
  private constructor(
    readonly outcomes: readonly number[],
    readonly mask: number
  ) {}

  /**
   * Region containing the given outcomes, in any order, duplicates ignored
   */
  static of(...outcomes: number[]): Region {
    let mask = 0;
    for (const outcome of outcomes) {
      if (!Number.isInteger(outcome) || outcome < 0 || outcome >= MAX_OUTCOMES) {
        throw new InvalidInputError(`Invalid outcome index: ${outcome}`, {
          outcome,
          maxOutcomes: MAX_OUTCOMES,
        });
      }
      mask |= 1 << outcome;
    }
    return Region.fromMask(mask);
  }

  /**
   * Region whose indicator bitmask is `mask` (bit i set means outcome i is in)
   */
  static fromMask(mask: number): Region {
    if (!Number.isInteger(mask) || mask < 0 || mask >= 2 ** MAX_OUTCOMES) {
      throw new InvalidInputError(`Invalid region mask: ${mask}`, { mask });
    }

    const outcomes: number[] = [];
    for (let i = 0; i < MAX_OUTCOMES; i++) {
      if ((mask >>> i) & 1) {
        outcomes.push(i);
      }
    }
    return new Region(Object.freeze(outcomes), mask);
  }

  static empty(): Region {
    return Region.fromMask(0);
  }

  /**
   * The whole outcome space {0, …, n−1}
   */
  static full(outcomeCount: number): Region {
    if (!Number.isInteger(outcomeCount) || outcomeCount < 0 || outcomeCount > MAX_OUTCOMES) {
      throw new InvalidInputError(`Invalid outcome count: ${outcomeCount}`, {
        outcomeCount,
        maxOutcomes: MAX_OUTCOMES,
      });
    }
    return Region.fromMask(2 ** outcomeCount - 1);
  }

  /**
   * Number of outcomes in the region
   */
  get cardinality(): number {
    return this.outcomes.length;
  }

  get isEmpty(): boolean {
    return this.mask === 0;
  }

  /**
   * Largest outcome index plus one (0 for the empty region)
   */
  get span(): number {
    return this.isEmpty ? 0 : this.outcomes[this.outcomes.length - 1] + 1;
  }

  has(outcome: number): boolean {
    return Number.isInteger(outcome) && outcome >= 0 && outcome < MAX_OUTCOMES
      ? ((this.mask >>> outcome) & 1) === 1
      : false;
  }

  equals(other: Region): boolean {
    return this.mask === other.mask;
  }

  /**
   * Total order by indicator bitmask, the enumeration order
   */
  compare(other: Region): number {
    return this.mask - other.mask;
  }

  isSubsetOf(other: Region): boolean {
    return (this.mask & other.mask) === this.mask;
  }

  union(other: Region): Region {
    return Region.fromMask((this.mask | other.mask) >>> 0);
  }

  /**
   * Stable lookup key, e.g. "0,1"
   */
  get key(): string {
    return this.outcomes.join(',');
  }

  /**
   * Printed form, e.g. "(0, 1)" or "()"
   */
  toString(): string {
    return `(${this.outcomes.join(', ')})`;
  }

  toJSON(): number[] {
    return [...this.outcomes];
  }
}
