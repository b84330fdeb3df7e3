/**
 * Parser for predicate expressions.
 *
 *   project_type == "Python"
 *   ai_tool in ["Claude", "All"]
 *   use_git and not (include_testing or project_type != 'Swift')
 *
 * Keywords have symbolic aliases: `&&`, `||`, `!`. Lists may use `[...]` or `{...}`.
 */
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import type { Literal, Predicate } from './types.js';

type TokenKind =
  | 'ident'
  | 'string'
  | 'true'
  | 'false'
  | 'and'
  | 'or'
  | 'not'
  | 'in'
  | 'eq'
  | 'ne'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'lbrace'
  | 'rbrace'
  | 'comma'
  | 'eof';

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const KEYWORDS = new Map<string, TokenKind>([
  ['and', 'and'],
  ['or', 'or'],
  ['not', 'not'],
  ['in', 'in'],
  ['true', 'true'],
  ['True', 'true'],
  ['false', 'false'],
  ['False', 'false'],
]);

const PUNCTUATION: Array<[string, TokenKind]> = [
  ['==', 'eq'],
  ['!=', 'ne'],
  ['&&', 'and'],
  ['||', 'or'],
  ['!', 'not'],
  ['(', 'lparen'],
  [')', 'rparen'],
  ['[', 'lbracket'],
  [']', 'rbracket'],
  ['{', 'lbrace'],
  ['}', 'rbrace'],
  [',', 'comma'],
];

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;

/**
 * Parse a predicate expression. `origin` names where it came from in error messages.
 */
export function parsePredicate(source: string, origin?: string): Predicate {
  const parser = new PredicateParser(source, origin);
  return parser.parse();
}

/**
 * Convert a `when:` value from YAML, which may be a plain boolean.
 */
export function predicateFromSource(source: string | boolean, origin?: string): Predicate {
  if (typeof source === 'boolean') {
    return { kind: 'const', value: source };
  }
  return parsePredicate(source, origin);
}

class PredicateParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly origin?: string
  ) {
    this.tokens = this.tokenize();
  }

  parse(): Predicate {
    const predicate = this.parseOr();
    this.expect('eof', 'end of expression');
    return predicate;
  }

  private parseOr(): Predicate {
    const operands = [this.parseAnd()];
    while (this.match('or')) {
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { kind: 'or', operands };
  }

  private parseAnd(): Predicate {
    const operands = [this.parseUnary()];
    while (this.match('and')) {
      operands.push(this.parseUnary());
    }
    return operands.length === 1 ? operands[0] : { kind: 'and', operands };
  }

  private parseUnary(): Predicate {
    if (this.match('not')) {
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Predicate {
    const token = this.advance();

    switch (token.kind) {
      case 'true':
        return { kind: 'const', value: true };
      case 'false':
        return { kind: 'const', value: false };
      case 'lparen': {
        const inner = this.parseOr();
        this.expect('rparen', "')'");
        return inner;
      }
      case 'ident':
        return this.parseOperator(token.text);
      default:
        throw this.error(token, 'a variable name, true, false or (');
    }
  }

  private parseOperator(name: string): Predicate {
    if (this.match('eq')) {
      return { kind: 'eq', name, value: this.parseLiteral() };
    }
    if (this.match('ne')) {
      return { kind: 'ne', name, value: this.parseLiteral() };
    }
    if (this.match('in')) {
      return { kind: 'in', name, values: this.parseList() };
    }
    if (this.peek().kind === 'not' && this.peek(1).kind === 'in') {
      this.index += 2;
      return { kind: 'not_in', name, values: this.parseList() };
    }
    return { kind: 'var', name };
  }

  private parseLiteral(): Literal {
    const token = this.advance();
    switch (token.kind) {
      case 'string':
        return token.text;
      case 'true':
        return true;
      case 'false':
        return false;
      default:
        throw this.error(token, 'a quoted string, true or false');
    }
  }

  private parseList(): Literal[] {
    const open = this.advance();
    let close: TokenKind;
    if (open.kind === 'lbracket') {
      close = 'rbracket';
    } else if (open.kind === 'lbrace') {
      close = 'rbrace';
    } else {
      throw this.error(open, "'[' or '{'");
    }

    const values = [this.parseLiteral()];
    while (this.match('comma')) {
      values.push(this.parseLiteral());
    }
    this.expect(close, close === 'rbracket' ? "']'" : "'}'");
    return values;
  }

  private peek(offset = 0): Token {
    const at = Math.min(this.index + offset, this.tokens.length - 1);
    return this.tokens[at];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.index++;
    }
    return token;
  }

  private match(kind: TokenKind): boolean {
    if (this.peek().kind === kind) {
      this.index++;
      return true;
    }
    return false;
  }

  private expect(kind: TokenKind, description: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw this.error(token, description);
    }
    return this.advance();
  }

  private error(token: Token, expected: string): TemplateError {
    const found = token.kind === 'eof' ? 'end of expression' : `'${token.text}'`;
    return this.syntaxError(`expected ${expected} but found ${found}`, token.position);
  }

  private syntaxError(problem: string, position: number): TemplateError {
    const where = this.origin ? ` in ${this.origin}` : '';
    return new TemplateError(
      ErrorCodes.PREDICATE_SYNTAX,
      `Invalid predicate "${this.source}"${where}: ${problem} (at column ${position + 1})`,
      { predicate: this.source, origin: this.origin, position }
    );
  }

  private tokenize(): Token[] {
    const tokens: Token[] = [];
    const src = this.source;
    let pos = 0;

    outer: while (pos < src.length) {
      const ch = src[pos];

      if (/\s/.test(ch)) {
        pos++;
        continue;
      }

      if (ch === '"' || ch === "'") {
        const [text, end] = this.readString(pos);
        tokens.push({ kind: 'string', text, position: pos });
        pos = end;
        continue;
      }

      if (IDENT_START.test(ch)) {
        let end = pos + 1;
        while (end < src.length && IDENT_PART.test(src[end])) end++;
        const text = src.slice(pos, end);
        tokens.push({ kind: KEYWORDS.get(text) ?? 'ident', text, position: pos });
        pos = end;
        continue;
      }

      for (const [symbol, kind] of PUNCTUATION) {
        if (src.startsWith(symbol, pos)) {
          tokens.push({ kind, text: symbol, position: pos });
          pos += symbol.length;
          continue outer;
        }
      }

      throw this.syntaxError(`unexpected character '${ch}'`, pos);
    }

    tokens.push({ kind: 'eof', text: '', position: src.length });
    return tokens;
  }

  /** Read a quoted string starting at `start`; returns its value and the index after the closing quote. */
  private readString(start: number): [string, number] {
    const quote = this.source[start];
    let value = '';
    let pos = start + 1;

    while (pos < this.source.length) {
      const ch = this.source[pos];
      if (ch === '\\' && pos + 1 < this.source.length) {
        value += this.source[pos + 1];
        pos += 2;
        continue;
      }
      if (ch === quote) {
        return [value, pos + 1];
      }
      value += ch;
      pos++;
    }

    throw this.syntaxError('unterminated string', start);
  }
}
