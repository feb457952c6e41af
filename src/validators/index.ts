/**
 * Validators Module
 * Exports the validators and dispatch by identifier type
 */

export {
  validateLuhn,
  normalizeCardNumber,
  CARD_NUMBER_MIN_DIGITS,
  CARD_NUMBER_MAX_DIGITS,
} from './credit-card.js';
export {
  validateSsnFormat,
  parseSsn,
  type SsnSegments,
  NATIONAL_ID_DIGITS,
  NATIONAL_ID_MAX_AREA_EXCLUSIVE,
  NATIONAL_ID_RESERVED_AREA,
} from './national-id.js';

import { IdentifierType, type CandidateValidator } from '../types/index.js';
import { validateLuhn } from './credit-card.js';
import { validateSsnFormat } from './national-id.js';

/**
 * Validator per identifier type
 */
export const CANDIDATE_VALIDATORS: Readonly<Record<IdentifierType, CandidateValidator>> = {
  [IdentifierType.CREDIT_CARD]: validateLuhn,
  [IdentifierType.NATIONAL_ID]: validateSsnFormat,
};

/**
 * Validates a candidate against the identifier class the matcher assigned to it
 */
export function validateCandidate(type: IdentifierType, candidate: string): boolean {
  return CANDIDATE_VALIDATORS[type](candidate);
}
