import { describe, it, expect } from 'vitest';
import { isPageSelector, parsePageSelector, resolvePageSelector, selectPages } from '../lib/page-selector.js';

describe('parsePageSelector', () => {
  it('should expand "all" to every page', () => {
    expect(parsePageSelector('all', 5)).toEqual([1, 2, 3, 4, 5]);
    expect(parsePageSelector('', 3)).toEqual([1, 2, 3]);
  });

  it('should expand ranges', () => {
    expect(parsePageSelector('2-4', 10)).toEqual([2, 3, 4]);
    expect(parsePageSelector('3-end', 5)).toEqual([3, 4, 5]);
  });

  it('should merge lists and ranges, sorted without duplicates', () => {
    expect(parsePageSelector('5,1,3-5,3', 10)).toEqual([1, 3, 4, 5]);
  });

  it('should drop pages outside the document', () => {
    expect(parsePageSelector('2,4,9', 5)).toEqual([2, 4]);
  });

  it('should reject reversed ranges and unknown tokens', () => {
    expect(() => parsePageSelector('5-2', 10)).toThrow(RangeError);
    expect(() => parsePageSelector('abc', 10)).toThrow(RangeError);
  });
});

describe('resolvePageSelector', () => {
  it('should keep the selector when automatic ranges are off', () => {
    expect(resolvePageSelector('1,3', 10, { useAutoPageRange: false, autoStartPage: 2 })).toBe('1,3');
  });

  it('should start from the configured page up to the last one', () => {
    expect(resolvePageSelector('1', 10, { useAutoPageRange: true, autoStartPage: 2 })).toBe('2-10');
  });

  it('should clamp the start page to the document', () => {
    expect(resolvePageSelector('all', 10, { useAutoPageRange: true, autoStartPage: 20 })).toBe('10-10');
  });
});

describe('selectPages', () => {
  it('should remove excluded pages', () => {
    expect(
      selectPages('2-4', 10, { useAutoPageRange: false, autoStartPage: 2, excludePages: [3] })
    ).toEqual([2, 4]);
  });
});

describe('isPageSelector', () => {
  it('should accept the supported forms', () => {
    expect(isPageSelector('all')).toBe(true);
    expect(isPageSelector('2-12')).toBe(true);
    expect(isPageSelector('1, 3-5, 7-end')).toBe(true);
  });

  it('should reject unknown tokens and reversed ranges', () => {
    expect(isPageSelector('abc')).toBe(false);
    expect(isPageSelector('5-2')).toBe(false);
    expect(isPageSelector('1,,2')).toBe(false);
  });
});
