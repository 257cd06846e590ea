/**
 * Policy variable substitution for resource patterns, e.g.
 * arn:aws:iam::*:user/${aws:username}
 */

import { getContextValue } from './conditions.js';
import type { WildcardSegment } from './wildcard.js';
import type { RequestContext } from './types.js';

const VARIABLE = /\$\{([^}]+)\}/g;

const LITERALS = new Map<string, string>([
  ['*', '*'],
  ['?', '?'],
  ['$', '$'],
]);

function resolveVariable(name: string, context: RequestContext): string | undefined {
  const literal = LITERALS.get(name);
  if (literal !== undefined) return literal;

  // ${key, 'default'} form
  const [key = '', fallback] = name.split(',').map(part => part.trim());
  const value = getContextValue(context, key);
  if (value !== undefined && value.length === 1 && value[0] !== undefined) {
    return value[0];
  }
  if (fallback !== undefined && /^'.*'$/.test(fallback)) {
    return fallback.slice(1, -1);
  }
  return undefined;
}

/**
 * Split a pattern into glob text and substituted values; the values match
 * literally, so ${*} stands for an asterisk. Returns null when a variable
 * is not available: such a pattern cannot match anything.
 */
export function substituteVariables(pattern: string, context: RequestContext): WildcardSegment[] | null {
  if (!pattern.includes('${')) return [{ text: pattern, literal: false }];

  const segments: WildcardSegment[] = [];
  let last = 0;
  for (const match of pattern.matchAll(VARIABLE)) {
    const start = match.index ?? 0;
    const value = resolveVariable(match[1] ?? '', context);
    if (value === undefined) return null;

    if (start > last) segments.push({ text: pattern.slice(last, start), literal: false });
    segments.push({ text: value, literal: true });
    last = start + match[0].length;
  }
  if (last < pattern.length) segments.push({ text: pattern.slice(last), literal: false });
  return segments;
}
