/**
 * Policy Module
 *
 * Policy document model, parsing and the matching primitives the
 * resolver is built on.
 */

export * from './types.js';
export * from './arn.js';
export { wildcardMatch, matchesAny, compileWildcard, segmentsMatch, type WildcardSegment } from './wildcard.js';
export { evaluateConditions, getContextValue } from './conditions.js';
export { substituteVariables } from './variables.js';
export { parsePolicyDocument } from './policy-parser.js';
