import type { LanguageDefinition } from './types.js';
import { EcmaScriptParser } from './ecmascript.js';

/**
 * Weighted evidence that content is JavaScript.
 */
export function scoreJavaScript(content: string): number {
  let score = 0;
  if (content.includes('function ') || content.includes('=>')) score += 2;
  if (['const ', 'let ', 'var '].some(keyword => content.includes(keyword))) score += 2;
  if (content.includes('require(')) score += 2;
  if (content.includes('{') && content.includes('}')) score += 1;
  return score;
}

export const javascriptDefinition: LanguageDefinition = {
  id: 'javascript',
  extensions: ['js', 'jsx', 'mjs', 'cjs'],
  parser: new EcmaScriptParser(),
  scoreContent: scoreJavaScript,
};
