import { describe, expect, it } from 'vitest';
import { StringUtils } from '../src/utils/similarity';

describe('StringUtils.similarityRatio', () => {
  it('scores identical strings as 1', () => {
    expect(StringUtils.similarityRatio('acme', 'acme')).toBe(1);
    expect(StringUtils.similarityRatio('', '')).toBe(1);
  });

  it('scores disjoint strings as 0', () => {
    expect(StringUtils.similarityRatio('abc', 'xyz')).toBe(0);
    expect(StringUtils.similarityRatio('abc', '')).toBe(0);
  });

  it('counts the longest block then recurses on both sides', () => {
    // "WIKIM" + "IA" = 7 matched characters out of 18
    expect(StringUtils.matchingCharacters('WIKIMEDIA', 'WIKIMANIA')).toBe(7);
    expect(StringUtils.similarityRatio('WIKIMEDIA', 'WIKIMANIA')).toBeCloseTo(14 / 18, 10);
  });

  it('matches a shared run inside longer strings', () => {
    expect(StringUtils.similarityRatio('abcd', 'bcde')).toBe(0.75);
  });

  it('is symmetric for simple names', () => {
    expect(StringUtils.similarityRatio('example', 'different'))
      .toBe(StringUtils.similarityRatio('different', 'example'));
    expect(StringUtils.similarityRatio('example', 'different')).toBe(0.25);
  });
});
