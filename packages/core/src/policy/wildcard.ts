/**
 * Wildcard matching for action and resource patterns.
 *
 * `*` matches any run of characters (including none), `?` exactly one.
 * Matching is case-sensitive and anchored at both ends.
 */

const compiled = new Map<string, RegExp>();
const MAX_COMPILED = 10_000;

function escapeRegex(char: string): string {
  return /[.*+?^${}()|[\]\\/]/.test(char) ? `\\${char}` : char;
}

/**
 * A piece of a pattern. Literal segments come from substituted policy
 * variables and never act as wildcards.
 */
export interface WildcardSegment {
  text: string;
  literal: boolean;
}

function segmentSource(segment: WildcardSegment): string {
  let source = '';
  for (const char of segment.text) {
    if (!segment.literal && char === '*') {
      source += '[\\s\\S]*';
    } else if (!segment.literal && char === '?') {
      source += '[\\s\\S]';
    } else {
      source += escapeRegex(char);
    }
  }
  return source;
}

function hasWildcard(text: string): boolean {
  return text.includes('*') || text.includes('?');
}

/**
 * Compile a glob pattern to an anchored regular expression
 */
export function compileWildcard(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  const regex = new RegExp(`^${segmentSource({ text: pattern, literal: false })}$`, 'u');
  if (compiled.size >= MAX_COMPILED) {
    compiled.clear();
  }
  compiled.set(pattern, regex);
  return regex;
}

export function wildcardMatch(pattern: string, value: string): boolean {
  if (pattern === '*') return true;
  if (!hasWildcard(pattern)) {
    return pattern === value;
  }
  return compileWildcard(pattern).test(value);
}

/**
 * Match a pattern made of glob and literal segments
 */
export function segmentsMatch(segments: readonly WildcardSegment[], value: string): boolean {
  if (segments.every(segment => !segment.literal)) {
    return wildcardMatch(segments.map(segment => segment.text).join(''), value);
  }
  if (segments.every(segment => segment.literal || !hasWildcard(segment.text))) {
    return segments.map(segment => segment.text).join('') === value;
  }
  return new RegExp(`^${segments.map(segmentSource).join('')}$`, 'u').test(value);
}

/**
 * True if any pattern in the list matches the value
 */
export function matchesAny(patterns: readonly string[], value: string): boolean {
  return patterns.some(pattern => wildcardMatch(pattern, value));
}
