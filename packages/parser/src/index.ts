// @sourcelens/parser - multi-language source parsing and symbol resolution

// =============================================================================
// TYPES
// =============================================================================

export type {
  SupportedLanguage,
  LanguageTag,
  ImportKind,
  ImportBinding,
  Import,
  ImportInit,
  PlainImport,
  FromImport,
  NamespaceImport,
  NamedImport,
  DefaultImport,
  SideEffectImport,
  RequireImport,
  DynamicImport,
  DeclarationKind,
  Declaration,
  FunctionDeclaration,
  BindingDeclaration,
  IdentifierReference,
  ParseResult,
  ParseResultInit,
} from './types.js';

export { createImport, createParseResult, isRelativeSpecifier, relativeLevel } from './types.js';

// =============================================================================
// TOKENIZER
// =============================================================================

export { tokenize } from './tokenizer/tokenizer.js';
export type { Token, TokenKind, PlainToken, TemplateToken } from './tokenizer/types.js';

// =============================================================================
// LANGUAGES
// =============================================================================

export {
  getLanguage,
  getAllLanguages,
  languageExists,
  languageForFile,
  LANGUAGE_IDS,
} from './ast/languages/registry.js';
export type { LanguageDefinition, LanguageParser, ParseOptions } from './ast/languages/types.js';
export { EcmaScriptParser } from './ast/languages/ecmascript.js';
export { PythonParser } from './ast/languages/python.js';

// =============================================================================
// DETECTION & PARSING
// =============================================================================

export { detectLanguage, parseFile } from './detector.js';

// =============================================================================
// RESOLUTION
// =============================================================================

export { resolveRelativeImport, resolveModuleToFile } from './import-resolver.js';
export type { KnownPaths, ResolveOptions } from './import-resolver.js';
export { normalizePath } from './utils/path-matching.js';

// =============================================================================
// ANALYSIS
// =============================================================================

export { findUnusedImports, findUnusedDeclarations } from './unused-analyzer.js';
