/**
 * Rejection regions: representation, enumeration and evaluation
 */

export { Region, MAX_OUTCOMES } from './Region';
export { RegionMap } from './RegionMap';
export { RegionSequence, enumerateRegions } from './RegionEnumerator';
export { evaluate } from './RegionEvaluator';
export type { RegionStats } from './RegionEvaluator';
