import { InvalidInputError, silentLogger } from '@sourcelens/core';
import { getAllLanguages, getLanguage, languageForFile } from './ast/languages/registry.js';
import type { ParseOptions } from './ast/languages/types.js';
import { createParseResult, type LanguageTag, type ParseResult } from './types.js';

function assertSource(content: unknown, filename: unknown): asserts content is string {
  if (typeof content !== 'string') {
    throw new InvalidInputError('Source content must be a string', { received: typeof content });
  }
  if (filename !== undefined && typeof filename !== 'string') {
    throw new InvalidInputError('Filename must be a string when given', { received: typeof filename });
  }
}

/**
 * Decide which language a source belongs to.
 *
 * A known file extension is authoritative. Otherwise every registered
 * language scores the content and the highest score wins; ties go to the
 * language registered first. No evidence at all yields `unknown`.
 */
export function detectLanguage(content: string, filename?: string): LanguageTag {
  assertSource(content, filename);

  if (filename) {
    const byExtension = languageForFile(filename);
    if (byExtension) return byExtension;
  }

  let best: LanguageTag = 'unknown';
  let bestScore = 0;
  for (const def of getAllLanguages()) {
    const score = def.scoreContent(content);
    if (score > bestScore) {
      best = def.id;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Detect the language (when the filename does not settle it) and run the
 * matching parser. Unrecognised content yields an empty `unknown` result;
 * malformed content never throws.
 *
 * @throws InvalidInputError when `content` is not a string
 */
export function parseFile(content: string, filename?: string, options: ParseOptions = {}): ParseResult {
  const logger = options.logger ?? silentLogger;
  const language = detectLanguage(content, filename);
  logger.debug(`${filename ?? '<source>'}: parsing as ${language}`);

  if (language === 'unknown') {
    return createParseResult({ language, raw: content });
  }

  return getLanguage(language).parser.parse(content, filename, { logger });
}
