/**
 * Query Parser
 *
 * Grammar (keywords are case-insensitive):
 *
 *   query  := ( preset | can | who ) [ 'depth' NUMBER ] EOF
 *   preset := 'preset' NAME term*
 *   can    := 'can' term ( 'do' term [ 'with' term ] | 'reach' term )
 *   who    := 'who' 'can' 'do' term [ 'with' term ]
 *
 * A term is a bare word or a quoted string.
 */

import { QuerySyntaxError } from '../errors/errors.js';
import { PRESET_NAMES, type PresetName, type QueryAst } from './ast.js';
import { displayToken, tokenize, type Token } from './tokenizer.js';

const MAX_DEPTH_LIMIT = 64;

function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some(name => name === value);
}

class QueryParser {
  private index = 0;

  constructor(
    private readonly query: string,
    private readonly tokens: Token[]
  ) {}

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: 'eof', value: '', position: this.query.length };
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private fail(token: Token, reason: string): never {
    throw new QuerySyntaxError(this.query, token.position, displayToken(token), reason);
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.kind === 'word' && token.value.toLowerCase() === keyword;
  }

  private expectKeyword(keyword: string): void {
    const token = this.next();
    if (!this.isKeyword(token, keyword)) {
      this.fail(token, `expected '${keyword}'`);
    }
  }

  private term(what: string): string {
    const token = this.next();
    if (token.kind === 'eof') {
      this.fail(token, `expected ${what}`);
    }
    if (token.value.length === 0) {
      this.fail(token, `${what} must not be empty`);
    }
    return token.value;
  }

  parse(): QueryAst {
    const head = this.next();
    let ast: QueryAst;

    if (this.isKeyword(head, 'preset')) {
      ast = this.parsePreset();
    } else if (this.isKeyword(head, 'can')) {
      ast = this.parseCan();
    } else if (this.isKeyword(head, 'who')) {
      ast = this.parseWho();
    } else {
      return this.fail(head, "expected 'preset', 'can' or 'who'");
    }

    if (this.isKeyword(this.peek(), 'depth')) {
      this.next();
      ast.depth = this.parseDepth();
    }

    const trailing = this.peek();
    if (trailing.kind !== 'eof') {
      this.fail(trailing, 'unexpected token');
    }
    return ast;
  }

  private parseDepth(): number {
    const token = this.next();
    if (token.kind !== 'word' || !/^\d+$/.test(token.value)) {
      this.fail(token, 'expected a depth (positive integer)');
    }
    const depth = Number.parseInt(token.value, 10);
    if (depth < 1 || depth > MAX_DEPTH_LIMIT) {
      this.fail(token, `depth must be between 1 and ${MAX_DEPTH_LIMIT}`);
    }
    return depth;
  }

  /**
   * Terms up to an unquoted 'depth' keyword or the end
   */
  private remainingTerms(): Token[] {
    const terms: Token[] = [];
    for (let token = this.peek(); token.kind !== 'eof' && !this.isKeyword(token, 'depth'); token = this.peek()) {
      terms.push(this.next());
    }
    return terms;
  }

  private parsePreset(): QueryAst {
    const nameToken = this.next();
    if (nameToken.kind === 'eof') {
      return this.fail(nameToken, 'expected a preset name');
    }
    const name = nameToken.value.toLowerCase();
    if (!isPresetName(name)) {
      return this.fail(nameToken, `unknown preset (known: ${PRESET_NAMES.join(', ')})`);
    }

    const args = this.remainingTerms();
    const maxArgs = name === 'connected' ? 2 : 1;
    const extra = args[maxArgs];
    if (extra) {
      this.fail(extra, `preset ${name} takes at most ${maxArgs} argument(s)`);
    }
    const [first, second] = args.map(token => token.value);

    switch (name) {
      case 'privesc':
        return { kind: 'preset', preset: 'privesc', selector: first ?? '*' };
      case 'admin':
        return { kind: 'preset', preset: 'admin', selector: first ?? '*' };
      case 'connected':
        return { kind: 'preset', preset: 'connected', source: first ?? '*', target: second ?? '*' };
    }
  }

  private parseCan(): QueryAst {
    const principal = this.term('a principal selector');
    const verb = this.next();

    if (this.isKeyword(verb, 'do')) {
      const action = this.term('an action');
      const resource = this.parseWith();
      return { kind: 'can-do', principal, action, resource };
    }
    if (this.isKeyword(verb, 'reach')) {
      const target = this.term('a principal selector');
      return { kind: 'can-reach', source: principal, target };
    }
    return this.fail(verb, "expected 'do' or 'reach'");
  }

  private parseWho(): QueryAst {
    this.expectKeyword('can');
    this.expectKeyword('do');
    const action = this.term('an action');
    const resource = this.parseWith();
    return { kind: 'who-can-do', action, resource };
  }

  private parseWith(): string {
    if (!this.isKeyword(this.peek(), 'with')) return '*';
    this.next();
    return this.term('a resource');
  }
}

/**
 * Parse a query string. Throws QuerySyntaxError with the position of the
 * offending token.
 */
export function parseQuery(query: string): QueryAst {
  return new QueryParser(query, tokenize(query)).parse();
}
