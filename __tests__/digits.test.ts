import {
  describe,
  expect,
  it
} from 'vitest';

import {
  addDigit,
  complementMask,
  countDigits,
  EMPTY_MASK,
  FULL_MASK,
  hasDigit,
  isDigit,
  maskDigits,
  maskOf,
  removeDigit
} from '../src/digits.ts';

describe('digit masks', () => {
  it('sets one bit per digit', () => {
    expect(maskOf([1])).toBe(0b1);
    expect(maskOf([9])).toBe(0b100000000);
    expect(maskOf([1, 5, 9])).toBe(0b100010001);
    expect(FULL_MASK).toBe(0b111111111);
  });

  it('adds and removes digits', () => {
    const mask = addDigit(addDigit(EMPTY_MASK, 4), 7);
    expect(hasDigit(mask, 4)).toBe(true);
    expect(hasDigit(mask, 5)).toBe(false);
    expect(maskDigits(removeDigit(mask, 4))).toEqual([7]);
  });

  it('complements within nine bits', () => {
    expect(maskDigits(complementMask(maskOf([2, 3, 5, 7])))).toEqual([1, 4, 6, 8, 9]);
    expect(complementMask(FULL_MASK)).toBe(EMPTY_MASK);
    expect(complementMask(EMPTY_MASK)).toBe(FULL_MASK);
  });

  it('counts members', () => {
    expect(countDigits(EMPTY_MASK)).toBe(0);
    expect(countDigits(maskOf([2, 6, 8]))).toBe(3);
    expect(countDigits(FULL_MASK)).toBe(9);
  });

  it('lists members in ascending order', () => {
    expect(maskDigits(maskOf([8, 1, 3]))).toEqual([1, 3, 8]);
  });
});

describe('isDigit', () => {
  it('accepts integers 1 through 9', () => {
    expect(isDigit(1)).toBe(true);
    expect(isDigit(9)).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isDigit(0)).toBe(false);
    expect(isDigit(10)).toBe(false);
    expect(isDigit(2.5)).toBe(false);
    expect(isDigit('3')).toBe(false);
    expect(isDigit(null)).toBe(false);
  });
});
