/**
 * Likelihood Ratio Classifier
 *
 * Orders outcomes by how strongly they favour the alternative,
 * alt(x) / null(x), and identifies the likelihood-ratio tests: the regions
 * "reject when the ratio exceeds k" for every achievable threshold k.
 *
 * Outcomes whose ratios tie move in or out of a test together, so the tests
 * are the prefixes of the tie-group sequence rather than of the outcome
 * sequence. Classification compares sets, never (size, power) values: two
 * different regions may share both numbers by coincidence.
 */

import { DistributionPair } from '../core/distributions/DistributionPair';
import { RatioOptions, resolveOptions } from '../core/options';
import { Region, RegionMap, enumerateRegions } from '../core/regions';

/**
 * Outcomes sharing one likelihood ratio (within tolerance)
 */
export interface RatioGroup {
  /** Ratio of the group's first outcome; NaN for outcomes impossible under both hypotheses */
  readonly ratio: number;
  readonly outcomes: readonly number[];
  readonly region: Region;
}

/**
 * alt(x) / null(x) per outcome.
 *
 * - null(x) = 0 and alt(x) > 0: +∞, the outcome is included first
 * - null(x) = alt(x) = 0: NaN, the outcome is irrelevant and ranked last
 */
export function likelihoodRatios(pair: DistributionPair): number[] {
  return pair.null.map((p0, outcome) => {
    const p1 = pair.alternative[outcome];
    if (p0 === 0) {
      return p1 > 0 ? Infinity : NaN;
    }
    return p1 / p0;
  });
}

/**
 * Whether two ratios belong in the same tie group under a relative epsilon
 */
export function ratiosTied(a: number, b: number, tolerance: number): boolean {
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (a === b) {
    return true;
  }
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    return false;
  }
  return Math.abs(a - b) <= tolerance * Math.max(Math.abs(a), Math.abs(b));
}

// Descending, NaN last
function compareRatios(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    return Number(aNaN) - Number(bNaN);
  }
  if (a === b) {
    return 0;
  }
  return a > b ? -1 : 1;
}

/**
 * Outcomes grouped by strictly decreasing likelihood ratio.
 * Each group is anchored at its largest ratio, so ties never chain.
 */
export function ratioGroups(pair: DistributionPair, options?: RatioOptions): RatioGroup[] {
  const { ratioTolerance } = resolveOptions(options);
  const ratios = likelihoodRatios(pair);

  const order = ratios
    .map((_, outcome) => outcome)
    .sort((a, b) => compareRatios(ratios[a], ratios[b]) || a - b);

  const groups: { ratio: number; outcomes: number[] }[] = [];
  for (const outcome of order) {
    const current = groups[groups.length - 1];
    if (current && ratiosTied(current.ratio, ratios[outcome], ratioTolerance)) {
      current.outcomes.push(outcome);
    } else {
      groups.push({ ratio: ratios[outcome], outcomes: [outcome] });
    }
  }

  return groups.map(({ ratio, outcomes }) => {
    const sorted = [...outcomes].sort((a, b) => a - b);
    return { ratio, outcomes: sorted, region: Region.of(...sorted) };
  });
}

/**
 * The likelihood-ratio tests, from most to least conservative:
 * the empty region, then the union of the first 1, 2, … tie groups,
 * ending with the full outcome space. One more region than there are groups.
 */
export function prefixRegions(pair: DistributionPair, options?: RatioOptions): Region[] {
  const prefixes = [Region.empty()];
  for (const group of ratioGroups(pair, options)) {
    prefixes.push(prefixes[prefixes.length - 1].union(group.region));
  }
  return prefixes;
}

/**
 * Whether a region is exactly one of the prefix regions
 */
export function isLikelihoodRatioTest(
  region: Region,
  pair: DistributionPair,
  options?: RatioOptions
): boolean {
  return prefixRegions(pair, options).some((prefix) => prefix.equals(region));
}

/**
 * LRT flag for every enumerated region, in enumeration order
 */
export function classifyLRT(pair: DistributionPair, options?: RatioOptions): RegionMap<boolean> {
  const prefixes = new RegionMap(
    prefixRegions(pair, options).map((region) => [region, true] as const)
  );

  const flags = new RegionMap<boolean>();
  for (const region of enumerateRegions(pair)) {
    flags.set(region, prefixes.has(region));
  }
  return flags;
}
