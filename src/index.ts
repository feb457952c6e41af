/**
 * Candidate validators for sensitive-data detection.
 *
 * Stateless checks that confirm or reject identifier candidates
 * found by an upstream pattern matcher.
 *
 * @example
 * ```ts
 * import { validateLuhn, validateSsnFormat } from 'candidate-validators';
 *
 * validateLuhn('4111-1111-1111-1111'); // true
 * validateSsnFormat('666-45-6789'); // false
 * ```
 */

export * from './types/index.js';
export * from './validators/index.js';
export { luhnSum, calculateLuhnCheckDigit } from './utils/luhn.js';
