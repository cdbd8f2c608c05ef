/**
 * Distribution Pair
 *
 * The two competing hypotheses of a test: a null and an alternative
 * probability mass function over the outcome space {0, …, n−1}.
 * Validated once at construction and read-only afterwards.
 */

import { InvalidInputError } from '../errors';
import { DistributionOptions, resolveOptions } from '../options';

export type Hypothesis = 'null' | 'alternative';

export class DistributionPair {
  private readonly nullProbs: readonly number[];
  private readonly altProbs: readonly number[];

  /** Number of alternative outcomes filled in with probability 0 */
  readonly paddedOutcomes: number;

  /** Caller-visible notes about how the input was interpreted */
  readonly warnings: readonly string[];

  private constructor(nullProbs: number[], altProbs: number[], paddedOutcomes: number) {
    this.nullProbs = Object.freeze(nullProbs);
    this.altProbs = Object.freeze(altProbs);
    this.paddedOutcomes = paddedOutcomes;
    this.warnings = Object.freeze(
      paddedOutcomes > 0
        ? [
            `Alternative distribution padded with probability 0 for ${paddedOutcomes} trailing outcome(s)`,
          ]
        : []
    );
  }

  /**
   * Build a pair from two probability lists.
   *
   * An alternative list shorter than the null list is padded with zeros;
   * the number of padded outcomes is kept on the pair.
   */
  static from(
    nullProbs: readonly number[],
    altProbs: readonly number[],
    options?: DistributionOptions
  ): DistributionPair {
    const { sumTolerance } = resolveOptions(options);

    if (nullProbs.length === 0) {
      throw new InvalidInputError('Null distribution must cover at least one outcome');
    }

    if (altProbs.length > nullProbs.length) {
      throw new InvalidInputError('Alternative distribution covers more outcomes than the null', {
        nullLength: nullProbs.length,
        alternativeLength: altProbs.length,
      });
    }

    validateMass('null', nullProbs, sumTolerance);
    validateMass('alternative', altProbs, sumTolerance);

    const paddedOutcomes = nullProbs.length - altProbs.length;
    const padded = [...altProbs, ...new Array<number>(paddedOutcomes).fill(0)];

    return new DistributionPair([...nullProbs], padded, paddedOutcomes);
  }

  /**
   * Size of the outcome space
   */
  get outcomeCount(): number {
    return this.nullProbs.length;
  }

  /**
   * Probability of an outcome under the null hypothesis
   */
  nullProbability(outcome: number): number {
    return this.probability('null', outcome);
  }

  /**
   * Probability of an outcome under the alternative hypothesis
   */
  alternativeProbability(outcome: number): number {
    return this.probability('alternative', outcome);
  }

  probability(hypothesis: Hypothesis, outcome: number): number {
    if (!Number.isInteger(outcome) || outcome < 0 || outcome >= this.outcomeCount) {
      throw new InvalidInputError(`Outcome ${outcome} is outside the outcome space`, {
        outcome,
        outcomeCount: this.outcomeCount,
      });
    }
    const probs = hypothesis === 'null' ? this.nullProbs : this.altProbs;
    return probs[outcome];
  }

  get null(): readonly number[] {
    return this.nullProbs;
  }

  get alternative(): readonly number[] {
    return this.altProbs;
  }

  toJSON(): { null: number[]; alternative: number[]; paddedOutcomes: number } {
    return {
      null: [...this.nullProbs],
      alternative: [...this.altProbs],
      paddedOutcomes: this.paddedOutcomes,
    };
  }
}

function validateMass(hypothesis: Hypothesis, probs: readonly number[], tolerance: number): void {
  let sum = 0;

  probs.forEach((p, outcome) => {
    if (!Number.isFinite(p) || p < 0) {
      throw new InvalidInputError(
        `Probabilities must be non-negative finite numbers (${hypothesis}, outcome ${outcome})`,
        { hypothesis, outcome, value: p }
      );
    }
    sum += p;
  });

  if (Math.abs(sum - 1) > tolerance) {
    throw new InvalidInputError(`The ${hypothesis} distribution must sum to 1`, {
      hypothesis,
      sum,
      tolerance,
    });
  }
}
