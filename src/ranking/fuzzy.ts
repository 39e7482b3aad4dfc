/**
 * @fileoverview Subsequence fuzzy matching
 *
 * A query matches a text when every query character appears in the text in
 * order, ignoring case. Among the possible alignments we score the shortest
 * window ending at the earliest complete match: a forward pass finds where
 * the match can end, a backward pass from there finds the latest start, and
 * a final forward pass scores that window. Each pass is a single scan with
 * no allocation.
 */

export const SCORE_MATCH = 16;
export const BONUS_BOUNDARY = 8;
export const BONUS_CONSECUTIVE = 6;
export const BONUS_CASE = 1;
export const PENALTY_GAP_START = 3;
export const PENALTY_GAP_EXTENSION = 1;

/**
 * Text prepared once per candidate so matching does not lower-case on every
 * keystroke.
 */
export interface SearchableText {
  text: string;
  lower: string;
}

export interface PreparedQuery {
  text: string;
  lower: string;
}

export function prepareText(text: string): SearchableText {
  return { text, lower: text.toLowerCase() };
}

export function prepareQuery(query: string): PreparedQuery {
  const text = query.trim();
  return { text, lower: text.toLowerCase() };
}

export function isBoundary(text: string, index: number): boolean {
  if (index === 0) return true;
  const previous = text.charCodeAt(index - 1);
  // '/', '-', '_'
  return previous === 47 || previous === 45 || previous === 95;
}

/**
 * Score `query` against `target`, or return null when the query is not a
 * subsequence of the target. An empty query matches everything with 0.
 */
export function fuzzyScore(query: PreparedQuery, target: SearchableText): number | null {
  const q = query.lower;
  const t = target.lower;
  const n = q.length;
  if (n === 0) return 0;
  if (n > t.length) return null;

  // Forward: earliest index at which the whole query has been seen.
  let qi = 0;
  let end = -1;
  for (let ti = 0; ti < t.length; ti++) {
    if (t.charCodeAt(ti) === q.charCodeAt(qi)) {
      qi++;
      if (qi === n) {
        end = ti;
        break;
      }
    }
  }
  if (end < 0) return null;

  // Backward: latest start that still fits the query before `end`.
  qi = n - 1;
  let start = end;
  for (let ti = end; ti >= 0; ti--) {
    if (t.charCodeAt(ti) === q.charCodeAt(qi)) {
      qi--;
      if (qi < 0) {
        start = ti;
        break;
      }
    }
  }

  let score = 0;
  let previousMatch = -1;
  qi = 0;
  for (let ti = start; ti <= end && qi < n; ti++) {
    if (t.charCodeAt(ti) !== q.charCodeAt(qi)) continue;

    score += SCORE_MATCH;
    if (target.text.charCodeAt(ti) === query.text.charCodeAt(qi)) {
      score += BONUS_CASE;
    }
    if (isBoundary(target.text, ti)) {
      score += BONUS_BOUNDARY;
    } else if (previousMatch === ti - 1) {
      score += BONUS_CONSECUTIVE;
    }
    if (previousMatch >= 0 && ti - previousMatch > 1) {
      const gap = ti - previousMatch - 1;
      score -= PENALTY_GAP_START + (gap - 1) * PENALTY_GAP_EXTENSION;
    }

    previousMatch = ti;
    qi++;
  }

  return score;
}

