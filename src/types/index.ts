export * from './identifier-types.js';

/**
 * A validator answers one question: is this candidate a valid instance of its class?
 * Must be total: any input string yields a boolean, never a throw.
 */
export type CandidateValidator = (candidate: string) => boolean;
