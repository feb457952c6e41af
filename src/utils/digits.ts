/**
 * Digit Extraction
 * Shared by the validators: keeps ASCII 0-9, drops separators and everything else
 */

const CHAR_CODE_0 = 0x30;
const CHAR_CODE_9 = 0x39;

/**
 * Lazily yields the value of each ASCII decimal digit in the candidate.
 * Non-ASCII digits (e.g. fullwidth forms) are not digits here.
 */
export function* extractDigits(candidate: string): Generator<number, void, undefined> {
  for (let i = 0; i < candidate.length; i++) {
    const code = candidate.charCodeAt(i);
    if (code >= CHAR_CODE_0 && code <= CHAR_CODE_9) {
      yield code - CHAR_CODE_0;
    }
  }
}

/**
 * Materializes the digit sequence of a candidate
 */
export function collectDigits(candidate: string): number[] {
  return Array.from(extractDigits(candidate));
}

/**
 * Folds digits[start, end) into an unsigned integer
 */
export function digitsToNumber(digits: readonly number[], start: number, end: number): number {
  return digits.slice(start, end).reduce((value, digit) => value * 10 + digit, 0);
}
