/**
 * Result objects for Lemma analyses
 */

export { AnalysisResult } from './AnalysisResult';
export type { ResultMetadata } from './ResultMetadata';
export { RegionAnalysisResult } from './RegionAnalysisResult';
export type { RegionRow } from './RegionAnalysisResult';
