/**
 * Luhn Algorithm (Mod 10) Implementation
 * Checksum arithmetic used by payment-card numbering schemes
 */

import { collectDigits } from './digits.js';

/**
 * Luhn sum of a digit sequence, processed right to left.
 * Every second digit from the right is doubled (minus 9 when above 9).
 */
export function luhnSum(digits: readonly number[]): number {
  let sum = 0;
  let isOdd = false;

  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits[i] ?? 0;

    if (isOdd) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }

    sum += digit;
    isOdd = !isOdd;
  }

  return sum;
}

/**
 * Calculates the Luhn check digit for a partial number
 * @param partialNumber - Digits without the check digit (separators are ignored)
 * @returns The check digit (0-9)
 */
export function calculateLuhnCheckDigit(partialNumber: string): number {
  // The appended check digit takes position 0, so shift the payload by one
  const sum = luhnSum([...collectDigits(partialNumber), 0]);

  return (10 - (sum % 10)) % 10;
}
