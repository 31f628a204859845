import { describe, expect, test } from 'vitest';

import { EditDistanceComparator } from './edit-distance-comparator';

describe('EditDistanceComparator', () => {
  const comparator = new EditDistanceComparator();

  test('returns zero rates for identical texts', () => {
    expect(comparator.compare('the quick fox', 'the quick fox')).toEqual({
      cer: 0,
      wer: 0,
    });
  });

  test('counts a substitution', () => {
    // kitten -> sitting: 3 edits over 6 characters
    expect(comparator.compare('kitten', 'sitting')).toEqual({
      cer: 0.5,
      wer: 1,
    });
  });

  test('normalizes word edits by reference word count', () => {
    const rates = comparator.compare('a b c d', 'a x c d');

    expect(rates.wer).toBe(0.25);
    expect(rates.cer).toBe(1 / 7);
  });

  test('counts insertions and deletions', () => {
    expect(comparator.compare('abc', 'abcd').cer).toBe(1 / 3);
    expect(comparator.compare('abcd', 'abc').cer).toBe(0.25);
  });

  test('can exceed 1 when the hypothesis is much longer', () => {
    expect(comparator.compare('ab', 'abcdef').cer).toBe(2);
  });

  test('trims both texts before comparing', () => {
    expect(comparator.compare('  hello world\n', 'hello world')).toEqual({
      cer: 0,
      wer: 0,
    });
  });

  test('treats multiple spaces as one word boundary', () => {
    expect(comparator.compare('one two', 'one    two').wer).toBe(0);
  });

  test('counts code points, not UTF-16 units', () => {
    expect(comparator.compare('a😀b', 'a😀c').cer).toBe(1 / 3);
  });

  test('handles an empty reference', () => {
    expect(comparator.compare('', '')).toEqual({ cer: 0, wer: 0 });
    expect(comparator.compare('', 'text')).toEqual({ cer: 1, wer: 1 });
  });
});
