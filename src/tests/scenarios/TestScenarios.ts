// src/tests/scenarios/TestScenarios.ts
import { DistributionPair } from '../../core/distributions/DistributionPair';
import { binomialPair } from '../../core/distributions/binomial';

/**
 * Centralized distribution pairs for consistent validation across the test suite
 */
export const TestScenarios = {
  // Red flowers among five bulbs, 75% red under the null, 30% under the alternative
  tulips: {
    description: 'Five-bulb tulip experiment, probabilities rounded to three decimals',
    null: [0.001, 0.015, 0.088, 0.264, 0.396, 0.237],
    alternative: [0.168, 0.36, 0.309, 0.132, 0.028, 0.002],
    pair: () => DistributionPair.from(TestScenarios.tulips.null, TestScenarios.tulips.alternative),
  },

  // Outcomes 1 and 2 share likelihood ratio 1
  tiedRatios: {
    description: 'Uniform null, ratios 1.6, 1, 1, 0.4',
    pair: () => DistributionPair.from([0.25, 0.25, 0.25, 0.25], [0.4, 0.25, 0.25, 0.1]),
  },

  // Outcome 0 is impossible under the null
  infiniteRatio: {
    description: 'Ratios ∞, 0.6, 1',
    pair: () => DistributionPair.from([0, 0.5, 0.5], [0.2, 0.3, 0.5]),
  },

  // Outcome 2 is impossible under both hypotheses
  irrelevantOutcome: {
    description: 'Ratios 0.4, 1.6, 0/0',
    pair: () => DistributionPair.from([0.5, 0.5, 0], [0.2, 0.8, 0]),
  },

  // Outcome 2 is impossible under the alternative
  zeroRatio: {
    description: 'Ratios 1, 2, 0 with exact binary probabilities',
    pair: () => DistributionPair.from([0.5, 0.25, 0.25], [0.5, 0.5, 0]),
  },

  // Full-support pairs for property checks
  fullSupport: [
    { description: 'Binomial(4, 0.5) vs Binomial(4, 0.8)', pair: () => binomialPair(4, 0.5, 0.8) },
    { description: 'Binomial(6, 0.6) vs Binomial(6, 0.35)', pair: () => binomialPair(6, 0.6, 0.35) },
    {
      description: 'Hand-made pair with a tie group',
      pair: () => DistributionPair.from([0.25, 0.25, 0.25, 0.25], [0.4, 0.25, 0.25, 0.1]),
    },
    {
      description: 'Five outcomes, uneven masses',
      pair: () => DistributionPair.from([0.1, 0.2, 0.3, 0.15, 0.25], [0.3, 0.05, 0.2, 0.25, 0.2]),
    },
  ],
};
