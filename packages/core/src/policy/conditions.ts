/**
 * Condition Evaluator
 *
 * Evaluates a statement's Condition block against a request context.
 * Keys are case-insensitive, values are compared as the operator dictates.
 * Operators this evaluator does not know never match.
 */

import { wildcardMatch } from './wildcard.js';
import type { ConditionBlock, RequestContext } from './types.js';

type ValueComparator = (contextValue: string, policyValue: string) => boolean;

type SetQualifier = 'ForAnyValue' | 'ForAllValues' | null;

interface ParsedOperator {
  qualifier: SetQualifier;
  base: string;
  ifExists: boolean;
}

function parseNumber(value: string): number | null {
  if (value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseDate(value: string): number | null {
  // Epoch seconds are allowed as well as ISO 8601
  const asNumber = parseNumber(value);
  if (asNumber !== null) return asNumber * 1000;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function numeric(compare: (a: number, b: number) => boolean): ValueComparator {
  return (contextValue, policyValue) => {
    const a = parseNumber(contextValue);
    const b = parseNumber(policyValue);
    return a !== null && b !== null && compare(a, b);
  };
}

function date(compare: (a: number, b: number) => boolean): ValueComparator {
  return (contextValue, policyValue) => {
    const a = parseDate(contextValue);
    const b = parseDate(policyValue);
    return a !== null && b !== null && compare(a, b);
  };
}

/**
 * ARN comparison is done per colon-separated segment
 */
function arnLike(contextValue: string, policyValue: string): boolean {
  const contextParts = contextValue.split(':');
  const policyParts = policyValue.split(':');
  if (contextParts.length < 6 || policyParts.length < 6) return false;

  const contextHead = contextParts.slice(0, 5);
  const policyHead = policyParts.slice(0, 5);
  for (let i = 0; i < 5; i++) {
    if (!wildcardMatch(policyHead[i] ?? '', contextHead[i] ?? '')) return false;
  }
  return wildcardMatch(policyParts.slice(5).join(':'), contextParts.slice(5).join(':'));
}

/**
 * Positive comparators; the negated operators reuse them
 */
const POSITIVE = new Map<string, ValueComparator>([
  ['StringEquals', (c, p) => c === p],
  ['StringEqualsIgnoreCase', (c, p) => c.toLowerCase() === p.toLowerCase()],
  ['StringLike', (c, p) => wildcardMatch(p, c)],
  ['ArnEquals', arnLike],
  ['ArnLike', arnLike],
  ['NumericEquals', numeric((a, b) => a === b)],
  ['NumericLessThan', numeric((a, b) => a < b)],
  ['NumericLessThanEquals', numeric((a, b) => a <= b)],
  ['NumericGreaterThan', numeric((a, b) => a > b)],
  ['NumericGreaterThanEquals', numeric((a, b) => a >= b)],
  ['DateEquals', date((a, b) => a === b)],
  ['DateLessThan', date((a, b) => a < b)],
  ['DateLessThanEquals', date((a, b) => a <= b)],
  ['DateGreaterThan', date((a, b) => a > b)],
  ['DateGreaterThanEquals', date((a, b) => a >= b)],
  ['Bool', (c, p) => c.toLowerCase() === p.toLowerCase()],
  ['BinaryEquals', (c, p) => c === p],
]);

const NEGATED = new Map<string, string>([
  ['StringNotEquals', 'StringEquals'],
  ['StringNotEqualsIgnoreCase', 'StringEqualsIgnoreCase'],
  ['StringNotLike', 'StringLike'],
  ['ArnNotEquals', 'ArnEquals'],
  ['ArnNotLike', 'ArnLike'],
  ['NumericNotEquals', 'NumericEquals'],
  ['DateNotEquals', 'DateEquals'],
]);

function parseOperator(operator: string): ParsedOperator {
  let rest = operator;
  let qualifier: SetQualifier = null;

  if (rest.startsWith('ForAnyValue:')) {
    qualifier = 'ForAnyValue';
    rest = rest.slice('ForAnyValue:'.length);
  } else if (rest.startsWith('ForAllValues:')) {
    qualifier = 'ForAllValues';
    rest = rest.slice('ForAllValues:'.length);
  }

  const ifExists = rest.endsWith('IfExists');
  if (ifExists) {
    rest = rest.slice(0, -'IfExists'.length);
  }

  return { qualifier, base: rest, ifExists };
}

/**
 * Look a key up ignoring case, as IAM does
 */
export function getContextValue(context: RequestContext, key: string): string[] | undefined {
  const lowered = key.toLowerCase();
  for (const [contextKey, value] of Object.entries(context)) {
    if (contextKey.toLowerCase() === lowered && value !== undefined) {
      return Array.isArray(value) ? value : [value];
    }
  }
  return undefined;
}

function evaluateKey(
  parsed: ParsedOperator,
  key: string,
  policyValues: string[],
  context: RequestContext
): boolean {
  const contextValues = getContextValue(context, key);

  if (parsed.base === 'Null') {
    const wantsMissing = policyValues.some(v => v.toLowerCase() === 'true');
    const missing = contextValues === undefined || contextValues.length === 0;
    return wantsMissing === missing;
  }

  const negatedBase = NEGATED.get(parsed.base);
  const comparator = POSITIVE.get(negatedBase ?? parsed.base);
  if (!comparator) return false;

  if (contextValues === undefined || contextValues.length === 0) {
    if (parsed.ifExists) return true;
    // ForAllValues over an empty set is vacuously true
    if (parsed.qualifier === 'ForAllValues') return true;
    // Negated operators match when the key is absent
    return negatedBase !== undefined;
  }

  const matchesValue = (contextValue: string): boolean => {
    const anyPolicyMatch = policyValues.some(policyValue => comparator(contextValue, policyValue));
    return negatedBase !== undefined ? !anyPolicyMatch : anyPolicyMatch;
  };

  if (parsed.qualifier === 'ForAllValues') {
    return contextValues.every(matchesValue);
  }
  return contextValues.some(matchesValue);
}

/**
 * True when every operator/key pair in the block is satisfied
 */
export function evaluateConditions(block: ConditionBlock, context: RequestContext): boolean {
  for (const [operator, keys] of Object.entries(block)) {
    const parsed = parseOperator(operator);
    for (const [key, policyValues] of Object.entries(keys)) {
      if (!evaluateKey(parsed, key, policyValues, context)) {
        return false;
      }
    }
  }
  return true;
}
