/**
 * Identifier Type Enumeration
 * Identifier classes the upstream matcher can hand over for validation
 */
export enum IdentifierType {
  // Financial identifiers
  CREDIT_CARD = 'CREDIT_CARD',

  // Government identifiers
  NATIONAL_ID = 'NATIONAL_ID',
}

/**
 * All identifier types as a readonly array for iteration
 */
export const ALL_IDENTIFIER_TYPES: readonly IdentifierType[] = Object.values(IdentifierType);
