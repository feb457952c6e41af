/**
 * National ID (SSN) Format Validator
 * Structural check of the 9-digit area-group-serial layout.
 * Says nothing about whether a number was ever issued.
 */

import { collectDigits, digitsToNumber } from '../utils/digits.js';

export const NATIONAL_ID_DIGITS = 9;

/** Area numbers at or above this value are not assigned */
export const NATIONAL_ID_MAX_AREA_EXCLUSIVE = 900;

/** Area number that is never assigned */
export const NATIONAL_ID_RESERVED_AREA = 666;

/**
 * The three fixed-width fields of a national ID
 */
export interface SsnSegments {
  /** Digits 1-3 */
  area: number;
  /** Digits 4-5 */
  group: number;
  /** Digits 6-9 */
  serial: number;
}

/**
 * Splits a candidate into area/group/serial.
 * Returns null unless the candidate carries exactly 9 digits.
 */
export function parseSsn(candidate: string): SsnSegments | null {
  const digits = collectDigits(candidate);

  if (digits.length !== NATIONAL_ID_DIGITS) {
    return null;
  }

  return {
    area: digitsToNumber(digits, 0, 3),
    group: digitsToNumber(digits, 3, 5),
    serial: digitsToNumber(digits, 5, 9),
  };
}

/**
 * Validates a national ID candidate's format
 */
export function validateSsnFormat(candidate: string): boolean {
  const segments = parseSsn(candidate);
  if (segments === null) {
    return false;
  }

  const { area, group, serial } = segments;

  // Invalid areas: 000, 666, 900-999
  if (
    area === 0 ||
    area === NATIONAL_ID_RESERVED_AREA ||
    area >= NATIONAL_ID_MAX_AREA_EXCLUSIVE
  ) {
    return false;
  }

  return group > 0 && serial > 0;
}
