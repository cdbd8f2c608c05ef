/**
 * Dominance Analyzer
 *
 * Pareto dominance over evaluated regions: B dominates A when B is no larger
 * (size) and no weaker (power), and strictly better in at least one of the two.
 * Regions with identical (size, power) never dominate one another.
 */

import { Region, RegionMap, RegionStats } from '../core/regions';

export type EvaluatedRegion = readonly [Region, RegionStats];

/**
 * Whether `b` dominates `a`
 */
export function dominates(b: RegionStats, a: RegionStats): boolean {
  return (
    b.size <= a.size && b.power >= a.power && (b.size < a.size || b.power > a.power)
  );
}

/**
 * Dominated flag for every region, keyed in input order.
 *
 * Sorted sweep over size: a region is dominated exactly when some strictly
 * smaller region reaches at least its power, or some equally sized region
 * exceeds it. Same answer as comparing every pair, in O(R log R).
 */
export function analyzeDominance(entries: Iterable<EvaluatedRegion>): RegionMap<boolean> {
  const evaluated = [...entries];
  const bySize = evaluated
    .map(([, stats], index) => ({ stats, index }))
    .sort((a, b) => a.stats.size - b.stats.size);

  const dominated = new Array<boolean>(evaluated.length).fill(false);
  let bestSmallerPower = -Infinity;

  let start = 0;
  while (start < bySize.length) {
    const size = bySize[start].stats.size;
    let end = start;
    let bestSamePower = -Infinity;
    while (end < bySize.length && bySize[end].stats.size === size) {
      bestSamePower = Math.max(bestSamePower, bySize[end].stats.power);
      end++;
    }

    for (let i = start; i < end; i++) {
      const { stats, index } = bySize[i];
      dominated[index] = bestSmallerPower >= stats.power || bestSamePower > stats.power;
    }

    bestSmallerPower = Math.max(bestSmallerPower, bestSamePower);
    start = end;
  }

  const flags = new RegionMap<boolean>();
  evaluated.forEach(([region], index) => {
    flags.set(region, dominated[index]);
  });
  return flags;
}
