import { describe, it, expect } from 'vitest';
import { extractDigits, collectDigits, digitsToNumber } from '../../src/utils/digits.js';

describe('extractDigits', () => {
  it('should yield digit values in order', () => {
    expect([...extractDigits('4111')]).toEqual([4, 1, 1, 1]);
  });

  it('should skip separators and letters', () => {
    expect([...extractDigits('12 3-4a5')]).toEqual([1, 2, 3, 4, 5]);
  });

  it('should not treat fullwidth digits as digits', () => {
    expect([...extractDigits('１２３-45')]).toEqual([4, 5]);
  });

  it('should yield nothing for empty input', () => {
    expect([...extractDigits('')]).toEqual([]);
  });

  it('should restart on every call', () => {
    const candidate = '9-8-7';
    expect([...extractDigits(candidate)]).toEqual([9, 8, 7]);
    expect([...extractDigits(candidate)]).toEqual([9, 8, 7]);
  });
});

describe('collectDigits', () => {
  it('should materialize the digit sequence', () => {
    expect(collectDigits('123-45-6789')).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });
});

describe('digitsToNumber', () => {
  const digits = [1, 2, 3, 0, 5, 0, 0, 0, 7];

  it('should fold a slice into a number', () => {
    expect(digitsToNumber(digits, 0, 3)).toBe(123);
    expect(digitsToNumber(digits, 3, 5)).toBe(5);
    expect(digitsToNumber(digits, 5, 9)).toBe(7);
  });

  it('should return 0 for an empty slice', () => {
    expect(digitsToNumber(digits, 4, 4)).toBe(0);
  });
});
