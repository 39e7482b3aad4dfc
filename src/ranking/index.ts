/**
 * @fileoverview Ranking engine exports
 */

export {
  fuzzyScore,
  prepareQuery,
  prepareText,
  type PreparedQuery,
  type SearchableText,
} from './fuzzy.js';
export {
  buildUsageIndex,
  decayWeight,
  usageKey,
  targetUsageKey,
  DEFAULT_HALF_LIFE_DAYS,
  type UsageIndex,
} from './usage.js';
export {
  rankCandidates,
  scoreCandidate,
  compareRanked,
  relevanceBand,
  toCandidates,
  candidateTarget,
  DEFAULT_NEAR_TIE_BAND,
  type Candidate,
  type CandidateScore,
  type MatchScore,
  type RankedCandidate,
  type RankingOptions,
} from './ranker.js';
