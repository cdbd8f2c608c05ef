/**
 * Region Selector
 *
 * The standard testing protocol: fix a maximum size, then take the most
 * powerful likelihood-ratio test within it. Only the prefix regions are
 * searched; by the Neyman–Pearson lemma no other region beats the best of them.
 */

import { DistributionPair } from '../core/distributions/DistributionPair';
import { InvalidBudgetError } from '../core/errors';
import { RatioOptions } from '../core/options';
import { Region, RegionStats, evaluate } from '../core/regions';
import { prefixRegions } from './LikelihoodRatioClassifier';

export interface Selection {
  readonly region: Region;
  readonly stats: RegionStats;
}

/**
 * Most powerful LRT region with size ≤ maxSize, together with its size and power.
 * Ties in power go to the smaller size.
 */
export function selectWithStats(
  pair: DistributionPair,
  maxSize: number,
  options?: RatioOptions
): Selection {
  if (Number.isNaN(maxSize) || maxSize < 0) {
    throw new InvalidBudgetError(`Size budget must be a non-negative number, got ${maxSize}`, {
      maxSize,
    });
  }

  let best: Selection | undefined;
  for (const region of prefixRegions(pair, options)) {
    const stats = evaluate(region, pair);
    if (stats.size > maxSize) {
      continue;
    }
    if (
      !best ||
      stats.power > best.stats.power ||
      (stats.power === best.stats.power && stats.size < best.stats.size)
    ) {
      best = { region, stats };
    }
  }

  // The empty prefix has size 0, so a non-negative budget always admits it
  if (!best) {
    throw new InvalidBudgetError(`No likelihood-ratio test has size within ${maxSize}`, {
      maxSize,
    });
  }
  return best;
}

/**
 * Most powerful LRT region with size ≤ maxSize
 */
export function select(pair: DistributionPair, maxSize: number, options?: RatioOptions): Region {
  return selectWithStats(pair, maxSize, options).region;
}
