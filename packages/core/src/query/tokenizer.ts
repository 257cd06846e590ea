/**
 * Query Tokenizer
 *
 * Splits a query string into bare words and quoted strings, remembering
 * the 0-based position of each token for error reporting.
 */

import { QuerySyntaxError } from '../errors/errors.js';

export type TokenKind = 'word' | 'string' | 'eof';

export interface Token {
  kind: TokenKind;
  value: string;
  /** 0-based character offset in the query */
  position: number;
}

const WHITESPACE = /\s/;

export function tokenize(query: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < query.length) {
    const char = query.charAt(i);

    if (WHITESPACE.test(char)) {
      i++;
      continue;
    }

    if (char === '"' || char === "'") {
      const close = query.indexOf(char, i + 1);
      if (close === -1) {
        throw new QuerySyntaxError(query, i, query.slice(i), 'unterminated quoted string');
      }
      tokens.push({ kind: 'string', value: query.slice(i + 1, close), position: i });
      i = close + 1;
      continue;
    }

    const start = i;
    while (i < query.length && !WHITESPACE.test(query.charAt(i))) {
      const current = query.charAt(i);
      if (current === '"' || current === "'") {
        throw new QuerySyntaxError(query, i, current, 'quote inside a bare word');
      }
      i++;
    }
    tokens.push({ kind: 'word', value: query.slice(start, i), position: start });
  }

  tokens.push({ kind: 'eof', value: '', position: query.length });
  return tokens;
}

/**
 * Token text as shown in error messages
 */
export function displayToken(token: Token): string {
  if (token.kind === 'eof') return 'end of query';
  return token.kind === 'string' ? JSON.stringify(token.value) : token.value;
}
