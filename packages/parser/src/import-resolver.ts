import { createConfig, silentLogger, type AnalysisConfig, type Logger } from '@sourcelens/core';
import { isRelativeSpecifier } from './types.js';
import {
  dirnameOf,
  endsAtBoundary,
  joinPath,
  moduleToPath,
  normalizePath,
  relativeSpecifierToPath,
  stripExtension,
  stripFinalExtension,
} from './utils/path-matching.js';

/**
 * Repository files an import may resolve to. A Map contributes its keys.
 */
export type KnownPaths = ReadonlyMap<string, unknown> | ReadonlySet<string> | readonly string[];

export interface ResolveOptions {
  config?: AnalysisConfig;
  logger?: Logger;
}

function listPaths(knownPaths: KnownPaths): string[] {
  return 'get' in knownPaths ? [...knownPaths.keys()] : [...knownPaths];
}

/** The stem of an index file, e.g. `__init__` for `__init__.py`. */
function indexStems(config: AnalysisConfig): string[] {
  return config.resolution.indexFiles.map(file => stripExtension(file, config.resolution.extensions));
}

/**
 * Resolve a relative import specifier against the importing file.
 *
 * Tried in order, first hit wins:
 * 1. a known path equal to the target, or equal to it once the known path
 *    loses its final extension and the target any source extension
 * 2. the target plus each configured extension
 * 3. the target directory plus each configured index file
 *
 * @returns The known path exactly as given, or null when nothing matches
 */
export function resolveRelativeImport(
  source: string,
  currentFile: string,
  knownPaths: KnownPaths,
  options: ResolveOptions = {},
): string | null {
  const logger = options.logger ?? silentLogger;
  if (!isRelativeSpecifier(source)) return null;

  const { extensions, indexFiles } = (options.config ?? createConfig()).resolution;
  const target = joinPath(dirnameOf(currentFile), relativeSpecifierToPath(source));
  const targetStem = stripExtension(target, extensions);
  const paths = listPaths(knownPaths).map(path => ({ path, normalized: normalizePath(path) }));

  // a known path may carry any extension (`.vue`, `.json`); the specifier only a source one
  const direct = paths.find(
    ({ normalized }) => normalized === target || stripFinalExtension(normalized) === targetStem,
  );
  if (direct) return direct.path;

  for (const candidate of [
    ...extensions.map(ext => target + ext),
    ...indexFiles.map(file => joinPath(target, file)),
  ]) {
    const hit = paths.find(({ normalized }) => normalized === candidate);
    if (hit) return hit.path;
  }

  logger.debug(`Could not resolve "${source}" from ${currentFile}`);
  return null;
}

/**
 * Resolve a module name to a known file.
 *
 * Relative names go through {@link resolveRelativeImport} and need
 * `currentFile`. Bare names (`pkg.mod`, `lib/util`) match a known path whose
 * extension-less form ends with the module path at a `/` boundary; a package
 * index file (`pkg/mod/__init__.py`) answers for its directory.
 */
export function resolveModuleToFile(
  module: string,
  knownPaths: KnownPaths,
  currentFile?: string,
  options: ResolveOptions = {},
): string | null {
  if (isRelativeSpecifier(module)) {
    return currentFile ? resolveRelativeImport(module, currentFile, knownPaths, options) : null;
  }

  const logger = options.logger ?? silentLogger;
  const config = options.config ?? createConfig();
  const modulePath = moduleToPath(module);
  if (modulePath === '') return null;

  const stems = listPaths(knownPaths).map(path => ({
    path,
    stem: stripExtension(normalizePath(path), config.resolution.extensions),
  }));

  const direct = stems.find(({ stem }) => endsAtBoundary(stem, modulePath));
  if (direct) return direct.path;

  const indexes = indexStems(config);
  const viaIndex = stems.find(({ stem }) =>
    indexes.some(
      index =>
        stem.endsWith('/' + index) && endsAtBoundary(stem.slice(0, -index.length - 1), modulePath),
    ),
  );
  if (viaIndex) return viaIndex.path;

  logger.debug(`Could not resolve module "${module}"`);
  return null;
}
