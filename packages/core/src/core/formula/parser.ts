/**
 * Formula parser.
 *
 * Grammar (whitespace insignificant, precedence `!` > `&` > `|`):
 *
 *   formula     := andExpr ("|" andExpr)*
 *   andExpr     := unary ("&" unary)*
 *   unary       := "!" unary | "(" formula ")" | atom
 *   atom        := STRING constraints?
 *   constraints := "{" cterm ("&"? cterm)* "}"
 *   cterm       := "!" cterm | "(" cterm ")" | COMPARATOR STRING
 *
 * Binary chains nest to the left: `a | b | c` is `(a | b) | c`.
 */

import { FormulaSyntaxError, MalformedVersionError } from '../../utils/errors.js';
import { createConstraint, isComparator, type Constraint } from '../version/constraint.js';
import { parseVersion } from '../version/version.js';
import {
  andFormula,
  notFormula,
  orFormula,
  packageFormula,
  type Formula
} from './types.js';

const TERM_START = 'a package name, "(" or "!"';
const COMPARATOR_EXPECTED = 'a comparator (=, !=, <, <=, >, >=)';
const COMPARATOR_CHARS: ReadonlySet<string> = new Set(['=', '!', '<', '>']);

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

class Parser {
  readonly source: string;
  private pos = 0;

  constructor(source: string) {
    this.source = source;
  }

  parse(): Formula {
    this.skipWhitespace();
    if (this.isEof()) {
      this.fail('a formula');
    }
    const node = this.parseOr();
    this.skipWhitespace();
    if (!this.isEof()) {
      this.fail('"&", "|" or end of input');
    }
    return node;
  }

  parseList(): Formula | undefined {
    let result: Formula | undefined;
    this.skipWhitespace();
    while (!this.isEof()) {
      const item = this.parseOr();
      result = result ? andFormula(result, item) : item;
      this.skipWhitespace();
    }
    return result;
  }

  parseConstraintList(): Constraint[] {
    this.skipWhitespace();
    if (this.isEof()) {
      this.fail('a version constraint');
    }

    const constraints: Constraint[] = [];
    while (true) {
      constraints.push(this.parseConstraintTerm(false));
      this.skipWhitespace();
      if (this.isEof()) break;
      if (this.consumeIf('&')) continue;
      this.expectConstraintStart('"&" or end of input');
    }
    return constraints;
  }

  private parseOr(): Formula {
    let left = this.parseAnd();
    while (true) {
      this.skipWhitespace();
      if (!this.consumeIf('|')) break;
      const right = this.parseAnd();
      left = orFormula(left, right);
    }
    return left;
  }

  private parseAnd(): Formula {
    let left = this.parseUnary();
    while (true) {
      this.skipWhitespace();
      if (!this.consumeIf('&')) break;
      const right = this.parseUnary();
      left = andFormula(left, right);
    }
    return left;
  }

  private parseUnary(): Formula {
    this.skipWhitespace();
    const ch = this.peek();

    if (ch === '!') {
      this.pos++;
      return notFormula(this.parseUnary());
    }

    if (ch === '(') {
      this.pos++;
      this.skipWhitespace();
      if (this.peek() === ')') {
        this.fail('a formula');
      }
      const inner = this.parseOr();
      this.skipWhitespace();
      if (!this.consumeIf(')')) {
        this.fail('")"');
      }
      return inner;
    }

    if (ch === '"') {
      return this.parseAtom();
    }

    this.fail(TERM_START);
  }

  private parseAtom(): Formula {
    const start = this.pos;
    const name = this.readString();
    if (name.trim() === '') {
      this.fail('a non-empty package name', start);
    }
    this.skipWhitespace();
    const constraints = this.peek() === '{' ? this.parseConstraintBlock() : [];
    return packageFormula(name, constraints);
  }

  private parseConstraintBlock(): Constraint[] {
    this.pos++;
    this.skipWhitespace();
    if (this.peek() === '}') {
      this.fail('a version constraint');
    }

    const constraints: Constraint[] = [];
    while (true) {
      constraints.push(this.parseConstraintTerm(false));
      this.skipWhitespace();
      if (this.consumeIf('}')) break;
      if (this.consumeIf('&')) continue;
      this.expectConstraintStart('"&" or "}"');
    }
    return constraints;
  }

  /** Constraints may sit side by side without `&` */
  private expectConstraintStart(expected: string): void {
    const ch = this.peek();
    if (ch === null || !(ch === '(' || COMPARATOR_CHARS.has(ch))) {
      this.fail(expected);
    }
  }

  private parseConstraintTerm(negated: boolean): Constraint {
    this.skipWhitespace();
    const ch = this.peek();

    if (ch === '!' && this.source[this.pos + 1] !== '=') {
      this.pos++;
      return this.parseConstraintTerm(!negated);
    }

    if (ch === '(') {
      this.pos++;
      const term = this.parseConstraintTerm(negated);
      this.skipWhitespace();
      if (!this.consumeIf(')')) {
        this.fail('")"');
      }
      return term;
    }

    const comparatorStart = this.pos;
    const token = this.readComparatorToken();
    if (!isComparator(token)) {
      if (token === '') {
        this.fail(COMPARATOR_EXPECTED);
      }
      this.fail(COMPARATOR_EXPECTED, comparatorStart, `"${token}"`);
    }

    this.skipWhitespace();
    if (this.peek() !== '"') {
      this.fail('a quoted version');
    }
    const versionStart = this.pos;
    const text = this.readString();
    try {
      return createConstraint(token, parseVersion(text), negated);
    } catch (error) {
      if (error instanceof MalformedVersionError) {
        this.fail('a valid version', versionStart, `"${text}"`);
      }
      throw error;
    }
  }

  private readComparatorToken(): string {
    const start = this.pos;
    while (!this.isEof() && COMPARATOR_CHARS.has(this.source[this.pos] ?? '')) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  /**
   * Reads a double-quoted string starting at the current position.
   * `\"` and `\\` escape the next character.
   */
  private readString(): string {
    const start = this.pos;
    this.pos++;
    let value = '';
    while (true) {
      const ch = this.peek();
      if (ch === null) {
        this.fail('a closing \'"\'', start, 'end of input');
      }
      if (ch === '\\') {
        const escaped = this.source[this.pos + 1];
        if (escaped === undefined) {
          this.fail('a closing \'"\'', start, 'end of input');
        }
        value += escaped;
        this.pos += 2;
        continue;
      }
      this.pos++;
      if (ch === '"') {
        return value;
      }
      value += ch;
    }
  }

  private skipWhitespace(): void {
    while (!this.isEof() && isWhitespace(this.source[this.pos] ?? '')) {
      this.pos++;
    }
  }

  private consumeIf(ch: string): boolean {
    if (this.peek() !== ch) return false;
    this.pos++;
    return true;
  }

  private peek(): string | null {
    return this.pos < this.source.length ? (this.source[this.pos] ?? null) : null;
  }

  private isEof(): boolean {
    return this.pos >= this.source.length;
  }

  private describe(position: number): string {
    const ch = this.source[position];
    return ch === undefined ? 'end of input' : `"${ch}"`;
  }

  private fail(expected: string, position: number = this.pos, found?: string): never {
    throw new FormulaSyntaxError(this.source, position, expected, found ?? this.describe(position));
  }
}

/**
 * Parses formula text into a Formula tree. Throws FormulaSyntaxError.
 */
export function parseFormula(text: string): Formula {
  return new Parser(text).parse();
}

/**
 * Parses the body of an opam `depends: [ ... ]` list: zero or more
 * formulas side by side, combined with AND. Returns undefined when the
 * body is empty.
 */
export function parseDependsList(text: string): Formula | undefined {
  return new Parser(text).parseList();
}

/**
 * Parses a bare constraint list such as `>= "1.0" & ! (< "1.2")`, the
 * contents of a `{ ... }` block without the braces.
 */
export function parseConstraints(text: string): Constraint[] {
  return new Parser(text).parseConstraintList();
}
