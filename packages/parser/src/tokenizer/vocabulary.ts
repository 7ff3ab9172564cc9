import vocabulary from './vocabulary.json' with { type: 'json' };

/**
 * Words that can never name a binding. Tokens spelled like these are
 * classified as `keyword`, never `identifier`.
 */
export const RESERVED_KEYWORDS: ReadonlySet<string> = new Set(vocabulary.reservedKeywords);

/**
 * Words that act as keywords only in certain positions (`type X =`,
 * `import { a } from`, `async function`) and are ordinary names elsewhere.
 * They are scanned as identifiers; parsers check their position.
 */
export const CONTEXTUAL_KEYWORDS: ReadonlySet<string> = new Set(vocabulary.contextualKeywords);

/**
 * Built-in types and well-known globals. Never user declarations and never
 * counted as references to one.
 */
export const BUILTIN_NAMES: ReadonlySet<string> = new Set(vocabulary.builtins);
