import { createConfig, type AnalysisConfig } from '@sourcelens/core';
import type { Import, ImportBinding, ParseResult } from './types.js';

/**
 * Name an import binding introduces into the file's scope.
 *
 * - `b as c` binds `c`
 * - `import os.path` binds `os`
 * - `from m import *` binds nothing we can see (null)
 */
function boundName(binding: ImportBinding, kind: Import['kind']): string | null {
  if (binding.alias) return binding.alias;
  if (binding.name === '*') return null;
  return kind === 'plain-import' ? binding.name.split('.')[0] : binding.name;
}

function referencedNames(result: ParseResult): Set<string> {
  return new Set(result.identifiers.map(ref => ref.name));
}

/**
 * Imports that bind at least one name, none of which is ever referenced.
 * Side-effect, require and dynamic imports bind nothing and are never
 * reported; neither is a wildcard import.
 */
export function findUnusedImports(result: ParseResult): Import[] {
  const used = referencedNames(result);

  return result.imports.filter(imp => {
    if (imp.names.length === 0) return false;

    const bound = imp.names.map(binding => boundName(binding, imp.kind));
    if (bound.some(name => name === null)) return false;

    return bound.every(name => name !== null && !used.has(name));
  });
}

/**
 * Names of top-level declarations never referenced in the same file.
 *
 * With `unused.includeExported` turned off, exported names are assumed to be
 * used elsewhere and are left out.
 */
export function findUnusedDeclarations(
  result: ParseResult,
  config: AnalysisConfig = createConfig(),
): string[] {
  const used = referencedNames(result);
  const unused: string[] = [];

  for (const [name, declaration] of result.declarations) {
    if (used.has(name)) continue;
    if (declaration.exported && !config.unused.includeExported) continue;
    unused.push(name);
  }

  return unused;
}
