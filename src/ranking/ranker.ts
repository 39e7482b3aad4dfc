/**
 * @fileoverview Candidate ranking
 *
 * Ordering keys, most significant first:
 *   1. band: how many `nearTieBand` widths a match's relevance sits below
 *      the best relevance for the query. Band 0 holds the best match and
 *      everything within one width of it.
 *   2. usage score (recency-weighted, see usage.ts)
 *   3. raw relevance score
 *   4. full name, case-insensitive, then by code unit
 *
 * Usage therefore reorders matches of comparable textual quality but can
 * never lift a candidate over one in a better band, and never admits a
 * candidate that does not match at all.
 */

import type { CandidateSet, TargetKind, UsageTarget } from '../types.js';
import { fuzzyScore, prepareQuery, prepareText, type PreparedQuery, type SearchableText } from './fuzzy.js';
import { usageKey, type UsageIndex } from './usage.js';

/** Width of a near-tie band in raw relevance points. */
export const DEFAULT_NEAR_TIE_BAND = 10;

export interface Candidate {
  kind: TargetKind;
  id: number;
  /** Repository short name, or the organization login. */
  name: string;
  /** `owner/name`, or the organization login. */
  fullName: string;
  private: boolean;
  description: string | null;
  usageKey: string;
  searchName: SearchableText;
  searchFullName: SearchableText;
}

export interface MatchScore {
  relevance: number;
  usage: number;
}

export interface CandidateScore extends MatchScore {
  /** 0 for the best band; larger is further below the best match. */
  band: number;
}

export interface RankedCandidate {
  candidate: Candidate;
  score: CandidateScore;
}

export interface RankingOptions {
  nearTieBand?: number;
}

/**
 * Flatten a cached candidate set into prepared candidates. Done once per
 * session; the result is reused for every query.
 */
export function toCandidates(set: CandidateSet): Candidate[] {
  const candidates: Candidate[] = [];
  for (const org of set.organizations) {
    const text = prepareText(org.login);
    candidates.push({
      kind: 'organization',
      id: org.id,
      name: org.login,
      fullName: org.login,
      private: false,
      description: null,
      usageKey: usageKey('organization', org.login),
      searchName: text,
      searchFullName: text,
    });
  }
  for (const repo of set.repositories) {
    candidates.push({
      kind: 'repository',
      id: repo.id,
      name: repo.name,
      fullName: repo.fullName,
      private: repo.private,
      description: repo.description,
      usageKey: usageKey('repository', repo.fullName),
      searchName: prepareText(repo.name),
      searchFullName: prepareText(repo.fullName),
    });
  }
  return candidates;
}

export function candidateTarget(candidate: Candidate): UsageTarget {
  return { kind: candidate.kind, id: candidate.id, key: candidate.fullName };
}

export function relevanceBand(relevance: number, best: number, width = DEFAULT_NEAR_TIE_BAND): number {
  if (!(width > 0)) return best === relevance ? 0 : 1;
  return Math.floor(Math.max(0, best - relevance) / width);
}

/**
 * Score one candidate, or return null when the query does not match its
 * short name or its full name.
 */
export function scoreCandidate(
  query: string | PreparedQuery,
  candidate: Candidate,
  usage: UsageIndex,
): MatchScore | null {
  const prepared = typeof query === 'string' ? prepareQuery(query) : query;
  const byName = fuzzyScore(prepared, candidate.searchName);
  const byFullName =
    candidate.searchFullName === candidate.searchName ? null : fuzzyScore(prepared, candidate.searchFullName);
  if (byName === null && byFullName === null) return null;

  const relevance = Math.max(byName ?? Number.NEGATIVE_INFINITY, byFullName ?? Number.NEGATIVE_INFINITY);
  return { relevance, usage: usage.get(candidate.usageKey) ?? 0 };
}

function compareNames(left: string, right: string): number {
  const lowerLeft = left.toLowerCase();
  const lowerRight = right.toLowerCase();
  if (lowerLeft !== lowerRight) return lowerLeft < lowerRight ? -1 : 1;
  return left < right ? -1 : left > right ? 1 : 0;
}

export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score.band !== b.score.band) return a.score.band - b.score.band;
  if (a.score.usage !== b.score.usage) return b.score.usage - a.score.usage;
  if (a.score.relevance !== b.score.relevance) return b.score.relevance - a.score.relevance;
  const byName = compareNames(a.candidate.fullName, b.candidate.fullName);
  if (byName !== 0) return byName;
  // An organization and a repository cannot share a full name; kind keeps the order total.
  return a.candidate.kind < b.candidate.kind ? -1 : a.candidate.kind > b.candidate.kind ? 1 : 0;
}

/**
 * Rank every matching candidate for `query`.
 */
export function rankCandidates(
  query: string,
  candidates: readonly Candidate[],
  usage: UsageIndex,
  options: RankingOptions = {},
): RankedCandidate[] {
  const prepared = prepareQuery(query);
  const matches: Array<{ candidate: Candidate; score: MatchScore }> = [];
  let best = Number.NEGATIVE_INFINITY;
  for (const candidate of candidates) {
    const score = scoreCandidate(prepared, candidate, usage);
    if (!score) continue;
    matches.push({ candidate, score });
    best = Math.max(best, score.relevance);
  }

  const width = options.nearTieBand ?? DEFAULT_NEAR_TIE_BAND;
  const ranked = matches.map(({ candidate, score }): RankedCandidate => ({
    candidate,
    score: { ...score, band: relevanceBand(score.relevance, best, width) },
  }));
  ranked.sort(compareRanked);
  return ranked;
}
