import { describe, it, expect } from 'vitest';
import { fuzzyScore, prepareQuery, prepareText, isBoundary } from '../fuzzy.js';

const score = (query: string, target: string): number | null => fuzzyScore(prepareQuery(query), prepareText(target));

describe('fuzzyScore', () => {
  it('returns null when the query is not a subsequence', () => {
    expect(score('ggx', 'gg')).toBeNull();
    expect(score('ba', 'ab')).toBeNull();
    expect(score('abc', 'ab')).toBeNull();
  });

  it('matches everything with 0 for an empty or blank query', () => {
    expect(score('', 'anything')).toBe(0);
    expect(score('   ', 'anything')).toBe(0);
  });

  it('ignores case for matching but rewards exact case', () => {
    // g: 16 + boundary 8 + case 1; h: 16 + consecutive 6 + case 1
    expect(score('gh', 'ghjump')).toBe(48);
    expect(score('GH', 'ghjump')).toBe(46);
  });

  it('rewards word boundaries after separators', () => {
    // w: 25; c after '-': 25, minus a gap of 3 (3 + 2)
    expect(score('wc', 'web-client')).toBe(45);
    expect(score('g', 'frankwiles/gg')).toBe(25);
    expect(score('g', 'blog')).toBe(17);
  });

  it('penalizes gaps, longer gaps more', () => {
    // j after a gap of one: 17 - 3
    expect(score('gj', 'ghjump')).toBe(39);
    // p after a gap of four: 17 - (3 + 3)
    expect(score('gp', 'ghjump')).toBe(36);
  });

  it('scores the tightest window ending at the first complete match', () => {
    // Aligning 'a' with index 3 (next to 'b') beats the boundary at index 0.
    expect(score('ab', 'a-xab')).toBe(40);
  });
});

describe('isBoundary', () => {
  it('treats string start and the characters after / - _ as boundaries', () => {
    expect(isBoundary('a/b-c_d', 0)).toBe(true);
    expect(isBoundary('a/b-c_d', 2)).toBe(true);
    expect(isBoundary('a/b-c_d', 4)).toBe(true);
    expect(isBoundary('a/b-c_d', 6)).toBe(true);
    expect(isBoundary('a/b-c_d', 1)).toBe(false);
    expect(isBoundary('a.b', 2)).toBe(false);
  });
});
