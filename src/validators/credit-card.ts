/**
 * Payment Card Validator
 * Digit-count gate plus Luhn checksum
 */

import { collectDigits } from '../utils/digits.js';
import { luhnSum } from '../utils/luhn.js';

/** Shortest card number in use (13 digits, e.g. legacy Visa) */
export const CARD_NUMBER_MIN_DIGITS = 13;

/** Longest card number allowed by ISO/IEC 7812 */
export const CARD_NUMBER_MAX_DIGITS = 19;

/**
 * Validates a payment-card candidate.
 * Separators are ignored, so "4111-1111-1111-1111" and "4111111111111111" agree.
 */
export function validateLuhn(candidate: string): boolean {
  const digits = collectDigits(candidate);

  if (digits.length < CARD_NUMBER_MIN_DIGITS || digits.length > CARD_NUMBER_MAX_DIGITS) {
    return false;
  }

  return luhnSum(digits) % 10 === 0;
}

/**
 * Strips a card number down to its digits
 */
export function normalizeCardNumber(candidate: string): string {
  return collectDigits(candidate).join('');
}
