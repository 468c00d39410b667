import { findClosestMatches, levenshteinDistance } from '../../src/utils/string-distance';

describe('levenshteinDistance', () => {
  it('should count edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });
});

describe('findClosestMatches', () => {
  it('should return close candidates, closest first', () => {
    expect(findClosestMatches('fild', ['fields', 'field', 'view'])).toEqual(['field', 'fields']);
  });

  it('should ignore case when comparing', () => {
    expect(findClosestMatches('OBJECT', ['object', 'other'])).toEqual(['object']);
  });

  it('should use a tight threshold for short names', () => {
    expect(findClosestMatches('int', ['map', 'int8'])).toEqual(['int8']);
  });
});
