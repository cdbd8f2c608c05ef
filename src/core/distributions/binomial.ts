/**
 * Binomial hypotheses
 *
 * Builds the pair for the common teaching case: count the successes in a
 * fixed number of independent trials, with the success probability under
 * each hypothesis known.
 */

import jStat from 'jstat';
import { InvalidInputError } from '../errors';
import { DistributionOptions } from '../options';
import { DistributionPair } from './DistributionPair';

/**
 * Probability mass of Binomial(trials, p) at 0, 1, …, trials
 */
export function binomialPmf(trials: number, p: number): number[] {
  if (!Number.isInteger(trials) || trials < 0) {
    throw new InvalidInputError(`Invalid Binomial parameters: trials=${trials}`, { trials });
  }
  if (!(p >= 0 && p <= 1)) {
    throw new InvalidInputError(`Invalid Binomial parameters: p=${p}`, { p });
  }

  const pmf: number[] = [];
  for (let k = 0; k <= trials; k++) {
    pmf.push(jStat.binomial.pdf(k, trials, p));
  }
  return pmf;
}

/**
 * Null Binomial(trials, nullP) against alternative Binomial(trials, altP)
 *
 * @example
 * ```typescript
 * // Red flowers out of five bulbs: 75% red under the null, 30% under the alternative
 * const pair = binomialPair(5, 0.75, 0.3);
 * ```
 */
export function binomialPair(
  trials: number,
  nullP: number,
  altP: number,
  options?: DistributionOptions
): DistributionPair {
  return DistributionPair.from(binomialPmf(trials, nullP), binomialPmf(trials, altP), options);
}
