/**
 * Inference over rejection regions: likelihood-ratio tests, dominance, selection
 */

export {
  likelihoodRatios,
  ratiosTied,
  ratioGroups,
  prefixRegions,
  isLikelihoodRatioTest,
  classifyLRT,
} from './LikelihoodRatioClassifier';
export type { RatioGroup } from './LikelihoodRatioClassifier';
export { dominates, analyzeDominance } from './DominanceAnalyzer';
export type { EvaluatedRegion } from './DominanceAnalyzer';
export { select, selectWithStats } from './RegionSelector';
export type { Selection } from './RegionSelector';
