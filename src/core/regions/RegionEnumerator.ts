/**
 * Region Enumerator
 *
 * The power set of the outcome space, one region per indicator bitmask
 * in ascending order: (), (0), (1), (0, 1), (2), …
 */

import { InvalidInputError } from '../errors';
import { DistributionPair } from '../distributions/DistributionPair';
import { MAX_OUTCOMES, Region } from './Region';

/**
 * Lazy, restartable sequence of all 2ⁿ regions over {0, …, n−1}.
 * Each iteration starts again from the empty region.
 */
export class RegionSequence implements Iterable<Region> {
  constructor(readonly outcomeCount: number) {}

  /**
   * Number of regions the sequence yields
   */
  get length(): number {
    return 2 ** this.outcomeCount;
  }

  *[Symbol.iterator](): Iterator<Region> {
    const total = this.length;
    for (let mask = 0; mask < total; mask++) {
      yield Region.fromMask(mask);
    }
  }

  toArray(): Region[] {
    return [...this];
  }
}

/**
 * Enumerate every candidate rejection region.
 *
 * @param outcomes - the outcome count n, or a pair whose domain length is used
 */
export function enumerateRegions(outcomes: number | DistributionPair): RegionSequence {
  const n = typeof outcomes === 'number' ? outcomes : outcomes.outcomeCount;

  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidInputError(`Outcome count must be a non-negative integer, got ${n}`, {
      outcomeCount: n,
    });
  }

  if (n > MAX_OUTCOMES) {
    throw new InvalidInputError(`Outcome count ${n} exceeds the enumerable maximum`, {
      outcomeCount: n,
      maxOutcomes: MAX_OUTCOMES,
    });
  }

  return new RegionSequence(n);
}
