import { describe, it, expect } from 'vitest';
import {
  normalizeTitle,
  parseYear,
  splitTrailingYear,
  titleSimilarity,
} from '../../src/domain/normalize.js';

describe('normalizeTitle', () => {
  it('should lowercase and strip diacritics', () => {
    expect(normalizeTitle('Amélie')).toBe('amelie');
    expect(normalizeTitle('THE MATRIX')).toBe('the matrix');
  });

  it('should replace punctuation with single spaces', () => {
    expect(normalizeTitle('Spider-Man: Into the Spider-Verse')).toBe('spider man into the spider verse');
    expect(normalizeTitle('  WALL·E  ')).toBe('wall e');
  });

  it('should keep digits and non-Latin letters', () => {
    expect(normalizeTitle('Blade Runner 2049')).toBe('blade runner 2049');
    expect(normalizeTitle('千と千尋の神隠し')).toBe('千と千尋の神隠し');
  });

  it('should handle empty and edge cases', () => {
    expect(normalizeTitle('')).toBe('');
    expect(normalizeTitle(' -- ')).toBe('');
  });
});

describe('titleSimilarity', () => {
  it('should be 1 for titles equal after normalization', () => {
    expect(titleSimilarity('Dune', 'dune')).toBe(1);
    expect(titleSimilarity('Spider-Man', 'Spider Man')).toBe(1);
  });

  it('should score shared bigrams', () => {
    // "dune" shares du, un, ne with "duneparttwo"
    expect(titleSimilarity('Dune', 'Dune: Part Two')).toBeCloseTo(6 / 13);
  });

  it('should be 0 for unrelated or empty titles', () => {
    expect(titleSimilarity('Alien', 'Heat')).toBe(0);
    expect(titleSimilarity('', 'Heat')).toBe(0);
    expect(titleSimilarity('M', 'Me')).toBe(0);
  });
});

describe('parseYear', () => {
  it('should parse valid years', () => {
    expect(parseYear('1982')).toBe(1982);
    expect(parseYear('2024-05-01')).toBe(2024);
  });

  it('should reject out-of-range years and junk', () => {
    expect(parseYear('1700')).toBeNull();
    expect(parseYear('abc')).toBeNull();
    expect(parseYear('')).toBeNull();
    expect(parseYear(null)).toBeNull();
    expect(parseYear(undefined)).toBeNull();
  });
});

describe('splitTrailingYear', () => {
  it('should split a trailing year in parentheses', () => {
    expect(splitTrailingYear('Dune: Part Two (2024)')).toEqual({ title: 'Dune: Part Two', year: 2024 });
    expect(splitTrailingYear('1917 (2019)')).toEqual({ title: '1917', year: 2019 });
  });

  it('should keep titles without a trailing year whole', () => {
    expect(splitTrailingYear('Blade Runner 2049')).toEqual({ title: 'Blade Runner 2049', year: null });
    expect(splitTrailingYear(' Heat ')).toEqual({ title: 'Heat', year: null });
  });
});
