import { extname } from 'path';
import { LensError, LensErrorCode } from '@sourcelens/core';
import type { SupportedLanguage } from '../../types.js';
import type { LanguageDefinition } from './types.js';
import { pythonDefinition } from './python.js';
import { javascriptDefinition } from './javascript.js';
import { typescriptDefinition } from './typescript.js';

/**
 * All registered language definitions, in detection tie-break order.
 * To add a new language, create a definition file and add it here.
 */
const definitions: LanguageDefinition[] = [
  pythonDefinition,
  javascriptDefinition,
  typescriptDefinition,
];

/**
 * Canonical list of supported language IDs.
 */
export const LANGUAGE_IDS: readonly SupportedLanguage[] = ['python', 'javascript', 'typescript'];

/**
 * Registry keyed by language id.
 */
const languageRegistry = new Map<string, LanguageDefinition>();
const extensionMap = new Map<string, SupportedLanguage>();

for (const def of definitions) {
  if (languageRegistry.has(def.id)) {
    throw new Error(`Duplicate language ID in registry: ${def.id}`);
  }
  languageRegistry.set(def.id, def);

  for (const ext of def.extensions) {
    if (extensionMap.has(ext)) {
      throw new Error(
        `Duplicate extension "${ext}" registered by "${def.id}" (already claimed by "${extensionMap.get(ext)}")`,
      );
    }
    extensionMap.set(ext, def.id);
  }
}

for (const id of LANGUAGE_IDS) {
  if (!languageRegistry.has(id)) {
    throw new Error(`Language "${id}" is in LANGUAGE_IDS but has no definition in the registry`);
  }
}

/**
 * Get the full language definition for a supported language.
 *
 * @throws LensError (UNSUPPORTED_LANGUAGE) if language is not registered
 */
export function getLanguage(language: string): LanguageDefinition {
  const def = languageRegistry.get(language);
  if (!def) {
    throw new LensError(
      `No language definition registered for: ${language}`,
      LensErrorCode.UNSUPPORTED_LANGUAGE,
      { language },
      'high',
      false,
    );
  }
  return def;
}

/**
 * Language claimed by a file's extension.
 *
 * @returns SupportedLanguage or null when the extension is unknown
 */
export function languageForFile(filePath: string): SupportedLanguage | null {
  const ext = extname(filePath).slice(1).toLowerCase();
  return extensionMap.get(ext) ?? null;
}

/**
 * Check if a language is registered (non-throwing).
 */
export function languageExists(language: string): boolean {
  return languageRegistry.has(language);
}

/**
 * Get all registered language definitions.
 */
export function getAllLanguages(): readonly LanguageDefinition[] {
  return definitions.slice();
}
