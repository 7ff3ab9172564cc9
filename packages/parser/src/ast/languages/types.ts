import type { Logger } from '@sourcelens/core';
import type { ParseResult, SupportedLanguage } from '../../types.js';

/**
 * Tree-sitter language grammar type.
 * Using any due to type incompatibility between parser packages and tree-sitter core.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type TreeSitterLanguage = any;

export interface ParseOptions {
  /** Receives fallback warnings and routing details; silent when omitted */
  logger?: Logger;
}

/**
 * Turns source text of one language into a ParseResult.
 * Implementations never throw for malformed content.
 */
export interface LanguageParser {
  parse(content: string, filename?: string, options?: ParseOptions): ParseResult;
}

/**
 * Complete definition for a language the dispatcher can route to.
 *
 * Each supported language has a single definition that assembles its
 * parser and detection data into one place.
 */
export interface LanguageDefinition {
  /** Language identifier (e.g., 'typescript', 'python') */
  id: SupportedLanguage;

  /** File extensions without dots (e.g., ['ts', 'tsx']) */
  extensions: string[];

  parser: LanguageParser;

  /**
   * Weighted marker score used when no file extension decides the language.
   * Zero means "no evidence".
   */
  scoreContent(content: string): number;
}
