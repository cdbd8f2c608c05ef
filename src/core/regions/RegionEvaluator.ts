/**
 * Region Evaluator
 *
 * Size and power of a rejection region: its probability under the null
 * and under the alternative hypothesis.
 */

import { InvalidInputError } from '../errors';
import { DistributionPair } from '../distributions/DistributionPair';
import { Region } from './Region';

export interface RegionStats {
  /** P(outcome in region | null), the false-positive rate */
  readonly size: number;

  /** P(outcome in region | alternative), the true-positive rate */
  readonly power: number;
}

/**
 * Sum both hypotheses' probabilities over the region, in ascending outcome order.
 * No rounding is applied.
 */
export function evaluate(region: Region, pair: DistributionPair): RegionStats {
  if (region.span > pair.outcomeCount) {
    throw new InvalidInputError('Region contains outcomes outside the distribution domain', {
      region: region.toJSON(),
      outcomeCount: pair.outcomeCount,
    });
  }

  let size = 0;
  let power = 0;
  for (const outcome of region.outcomes) {
    size += pair.null[outcome];
    power += pair.alternative[outcome];
  }

  return { size, power };
}
