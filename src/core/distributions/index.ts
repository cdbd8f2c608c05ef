/**
 * Hypothesis distributions
 */

export { DistributionPair } from './DistributionPair';
export type { Hypothesis } from './DistributionPair';
export { binomialPmf, binomialPair } from './binomial';
