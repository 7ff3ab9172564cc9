import type { LanguageDefinition } from './types.js';
import { EcmaScriptParser } from './ecmascript.js';
import { scoreJavaScript } from './javascript.js';

/**
 * Type annotations on top of everything that counts for JavaScript, so a
 * TypeScript file never scores below its untyped reading.
 */
export function scoreTypeScript(content: string): number {
  let score = scoreJavaScript(content);
  if ([': string', ': number', ': boolean'].some(marker => content.includes(marker))) score += 3;
  if (content.includes('interface ')) score += 3;
  if (content.includes('type ') && content.includes('=')) score += 2;
  return score;
}

export const typescriptDefinition: LanguageDefinition = {
  id: 'typescript',
  extensions: ['ts', 'tsx', 'mts', 'cts'],
  parser: new EcmaScriptParser(),
  scoreContent: scoreTypeScript,
};
