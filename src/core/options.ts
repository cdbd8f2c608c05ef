/**
 * Numeric tolerances shared by every entry point
 */

import { InvalidInputError } from './errors';

export interface DistributionOptions {
  /** Allowed |Σp − 1| for each probability mass function */
  sumTolerance?: number;
}

export interface RatioOptions {
  /** Relative epsilon under which two likelihood ratios form one tie group */
  ratioTolerance?: number;
}

export interface AnalysisOptions extends DistributionOptions, RatioOptions {}

export type ResolvedOptions = Required<AnalysisOptions>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  // Published tables are usually rounded to three decimals
  sumTolerance: 0.01,
  ratioTolerance: 1e-9,
};

/**
 * Fill in defaults and reject tolerances that cannot be compared against
 */
export function resolveOptions(options: AnalysisOptions = {}): ResolvedOptions {
  const resolved: ResolvedOptions = {
    sumTolerance: options.sumTolerance ?? DEFAULT_OPTIONS.sumTolerance,
    ratioTolerance: options.ratioTolerance ?? DEFAULT_OPTIONS.ratioTolerance,
  };

  for (const [name, value] of Object.entries(resolved)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(`Option ${name} must be a non-negative finite number`, {
        option: name,
        value,
      });
    }
  }

  return resolved;
}
