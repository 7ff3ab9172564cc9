import { RESERVED_KEYWORDS } from './vocabulary.js';
import type { PlainToken, Token, TokenKind } from './types.js';

const PUNCTUATION = new Set(['{', '}', '[', ']', '(', ')', ',', ';', ':', '.', '@', '#']);

// Longest first so greedy matching picks `>>>=` over `>>`.
const OPERATORS = [
  '>>>=', '===', '!==', '**=', '<<=', '>>=', '>>>', '&&=', '||=', '??=',
  '=>', '==', '!=', '<=', '>=', '&&', '||', '??', '++', '--',
  '+=', '-=', '*=', '%=', '&=', '|=', '^=', '**', '<<', '>>',
  '+', '-', '*', '%', '=', '!', '<', '>', '&', '|', '^', '~', '?',
];

const WHITESPACE = new Set([' ', '\t', '\r', '\f', '\v', '\u00a0', '\ufeff']);

// After `/`, these characters make a regex literal implausible.
const NOT_REGEX_START = new Set(['=', ' ', '\n', '\t', '\r']);

const IDENT_START = /[\p{ID_Start}$_]/u;
const IDENT_PART = /[\p{ID_Continue}$\u200c\u200d]/u;
const DIGIT = /[0-9]/;
const NUMBER_PART = /[0-9A-Za-z_.]/;

/**
 * A value is "in scope" to be divided when the previous token is one of
 * these; otherwise `/` opens a regex literal.
 */
function allowsRegex(previous: Token | undefined): boolean {
  if (!previous) return true;
  if (previous.kind === 'identifier' || previous.kind === 'numeric') return false;
  return previous.text !== ')' && previous.text !== ']';
}

/**
 * Single-pass scanner over C-family source.
 *
 * Never throws: unterminated strings, comments, regexes and templates
 * consume to the end of input (or degrade to an operator for regexes).
 */
class Scanner {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  run(): Token[] {
    if (this.source.startsWith('#!')) {
      this.skipLineComment();
    }
    return this.scanTokens(false);
  }

  /**
   * Scan until end of input, or, inside a template interpolation, until the
   * `}` that balances the opening `${`.
   */
  private scanTokens(insideInterpolation: boolean): Token[] {
    const tokens: Token[] = [];
    let braceDepth = 0;

    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      const next = this.source[this.pos + 1];

      if (char === '\n' || WHITESPACE.has(char)) {
        this.advance();
        continue;
      }

      if (char === '/') {
        if (next === '/') {
          this.skipLineComment();
          continue;
        }
        if (next === '*') {
          this.skipBlockComment();
          continue;
        }
        const regex = allowsRegex(tokens[tokens.length - 1]) && next !== undefined && !NOT_REGEX_START.has(next)
          ? this.scanRegex()
          : null;
        tokens.push(regex ?? this.scanFixed('operator', next === '=' ? '/=' : '/'));
        continue;
      }

      if (char === '"' || char === "'") {
        tokens.push(this.scanString(char));
        continue;
      }

      if (char === '`') {
        tokens.push(this.scanTemplate());
        continue;
      }

      if (IDENT_START.test(char) || (char === '#' && next !== undefined && IDENT_START.test(next))) {
        tokens.push(this.scanIdentifier());
        continue;
      }

      if (DIGIT.test(char) || (char === '.' && next !== undefined && DIGIT.test(next))) {
        tokens.push(this.scanNumber());
        continue;
      }

      if (char === '{') {
        braceDepth++;
      } else if (char === '}') {
        if (insideInterpolation && braceDepth === 0) {
          this.advance();
          return tokens;
        }
        braceDepth--;
      }

      const punctuation = this.matchPunctuation();
      if (punctuation) {
        tokens.push(this.scanFixed('punctuation', punctuation));
        continue;
      }

      const operator = OPERATORS.find(op => this.source.startsWith(op, this.pos));
      if (operator) {
        tokens.push(this.scanFixed('operator', operator));
        continue;
      }

      // Unknown character (e.g. a stray backslash); skip it.
      this.advance();
    }

    return tokens;
  }

  private advance(): void {
    if (this.source[this.pos] === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos++;
  }

  private advanceBy(count: number): void {
    for (let i = 0; i < count && this.pos < this.source.length; i++) {
      this.advance();
    }
  }

  private makeToken(kind: Exclude<TokenKind, 'template'>, start: number, line: number, column: number): PlainToken {
    return { kind, line, column, text: this.source.slice(start, this.pos) };
  }

  private scanFixed(kind: Exclude<TokenKind, 'template'>, text: string): PlainToken {
    const token: PlainToken = { kind, line: this.line, column: this.column, text };
    this.advanceBy(text.length);
    return token;
  }

  private matchPunctuation(): string | null {
    if (this.source.startsWith('...', this.pos)) return '...';
    if (this.source.startsWith('?.', this.pos) && !DIGIT.test(this.source[this.pos + 2] ?? '')) {
      return '?.';
    }
    const char = this.source[this.pos];
    return PUNCTUATION.has(char) ? char : null;
  }

  private skipLineComment(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
      this.advance();
    }
  }

  private skipBlockComment(): void {
    const end = this.source.indexOf('*/', this.pos + 2);
    const stop = end === -1 ? this.source.length : end + 2;
    this.advanceBy(stop - this.pos);
  }

  /**
   * Scan a regex literal starting at `/`. Returns null (consuming nothing)
   * when the literal does not close on the same line.
   */
  private scanRegex(): PlainToken | null {
    let i = this.pos + 1;
    let inClass = false;

    while (i < this.source.length) {
      const char = this.source[i];
      if (char === '\n') return null;
      if (char === '\\') {
        i += 2;
        continue;
      }
      if (char === '[') {
        inClass = true;
      } else if (char === ']') {
        inClass = false;
      } else if (char === '/' && !inClass) {
        i++;
        while (i < this.source.length && /[A-Za-z]/.test(this.source[i])) {
          i++;
        }
        const start = this.pos;
        const line = this.line;
        const column = this.column;
        this.advanceBy(i - this.pos);
        return this.makeToken('regex', start, line, column);
      }
      i++;
    }

    return null;
  }

  /**
   * Quoted string. Escapes are kept verbatim; the string runs to the
   * matching quote or to end of input.
   */
  private scanString(quote: string): PlainToken {
    const start = this.pos;
    const line = this.line;
    const column = this.column;
    this.advance();

    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      if (char === '\\') {
        this.advanceBy(2);
        continue;
      }
      this.advance();
      if (char === quote) break;
    }

    return this.makeToken('string', start, line, column);
  }

  /**
   * Template literal. `${` switches back to regular scanning (so braces in
   * the interpolation are balanced); the literal ends at an unescaped
   * backtick outside any interpolation.
   */
  private scanTemplate(): Token {
    const start = this.pos;
    const line = this.line;
    const column = this.column;
    const interpolations: Token[] = [];
    this.advance();

    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      if (char === '\\') {
        this.advanceBy(2);
        continue;
      }
      if (char === '`') {
        this.advance();
        break;
      }
      if (char === '$' && this.source[this.pos + 1] === '{') {
        this.advanceBy(2);
        interpolations.push(...this.scanTokens(true));
        continue;
      }
      this.advance();
    }

    return {
      kind: 'template',
      line,
      column,
      text: this.source.slice(start, this.pos),
      interpolations,
    };
  }

  private scanIdentifier(): PlainToken {
    const start = this.pos;
    const line = this.line;
    const column = this.column;
    this.advance();

    while (this.pos < this.source.length && IDENT_PART.test(this.source[this.pos])) {
      this.advance();
    }

    const token = this.makeToken('identifier', start, line, column);
    if (RESERVED_KEYWORDS.has(token.text)) {
      return { ...token, kind: 'keyword' };
    }
    return token;
  }

  private scanNumber(): PlainToken {
    const start = this.pos;
    const line = this.line;
    const column = this.column;
    const isPrefixed = /^0[xXoObB]/.test(this.source.slice(start, start + 2));

    while (this.pos < this.source.length) {
      const char = this.source[this.pos];
      const previous = this.source[this.pos - 1];
      const isExponentSign = !isPrefixed && (char === '+' || char === '-') && (previous === 'e' || previous === 'E');
      if (!NUMBER_PART.test(char) && !isExponentSign) break;
      this.advance();
    }

    return this.makeToken('numeric', start, line, column);
  }
}

/**
 * Turn C-family source text into a flat list of positioned tokens.
 *
 * Comments and whitespace are dropped. Template literals come back as one
 * token each, with their interpolation tokens attached.
 */
export function tokenize(source: string): Token[] {
  return new Scanner(source).run();
}
