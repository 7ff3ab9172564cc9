/**
 * Lexical categories produced by the tokenizer.
 */
export type TokenKind =
  | 'identifier'
  | 'keyword'
  | 'string'
  | 'numeric'
  | 'operator'
  | 'punctuation'
  | 'regex'
  | 'template';

interface TokenBase {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  /** Raw source slice */
  text: string;
}

export interface PlainToken extends TokenBase {
  kind: Exclude<TokenKind, 'template'>;
}

/**
 * A whole template literal, `${ }` parts included. The tokens scanned
 * inside its interpolations ride along so references there stay visible.
 */
export interface TemplateToken extends TokenBase {
  kind: 'template';
  interpolations: readonly Token[];
}

export type Token = PlainToken | TemplateToken;
