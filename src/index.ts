/**
 * Lemma - Neyman–Pearson rejection regions for discrete hypotheses
 *
 * Enumerates every rejection region for a null and an alternative
 * distribution over a small outcome space, with its size, power, Pareto
 * dominance and likelihood-ratio-test status, and picks the most powerful
 * test under a size budget.
 */

// Core: errors, options, distributions, regions
export * from './core';

// Likelihood-ratio tests, dominance, selection
export * from './inference';

// Whole-table analysis
export { analyzeRegions, discreteRegions } from './domain/analysis/RegionAnalyzer';
export type { SizePowerTable } from './domain/analysis/RegionAnalyzer';
export * from './domain/results';

// Rendering data
export { formatRegionTable, formatSizePowerTable } from './ui/report/table';
export type { TableOptions } from './ui/report/table';
export { encodeScatter } from './ui/visualizations/scatter';
export type { ScatterPoint, ScatterSpec, ScatterOptions } from './ui/visualizations/scatter';
export { RegionEncoding } from './ui/visualizations/colors';

// Version
export const VERSION = '0.1.0';
