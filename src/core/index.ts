/**
 * Core Lemma module exports
 */

// Error handling system
export {
  LemmaError,
  InvalidInputError,
  InvalidBudgetError,
  ErrorCode,
  isLemmaError,
  wrapError,
} from './errors';

// Options
export { DEFAULT_OPTIONS, resolveOptions } from './options';
export type {
  AnalysisOptions,
  DistributionOptions,
  RatioOptions,
  ResolvedOptions,
} from './options';

// Hypotheses
export * from './distributions';

// Regions
export * from './regions';
