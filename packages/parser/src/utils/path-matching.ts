/**
 * Shared path matching utilities for import resolution.
 *
 * All paths are compared in POSIX form: backslashes become forward slashes
 * and `.`/`..` segments are collapsed before any comparison.
 */

import { posix } from 'path';

/**
 * Escape special regex characters in a string.
 * This ensures extensions like "c++" don't break the regex pattern.
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Normalizes a file path for comparison.
 *
 * - Converts backslashes to forward slashes
 * - Collapses `.` and `..` segments and duplicate slashes
 * - Drops a leading `./` and a trailing `/`
 */
export function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, '/'));
  if (normalized === '.' || normalized === './') return '.';
  return normalized.replace(/^\.\//, '').replace(/(.)\/$/, '$1');
}

/**
 * Join a directory and a relative specifier, normalized.
 */
export function joinPath(dir: string, specifier: string): string {
  return normalizePath(posix.join(dir.replace(/\\/g, '/'), specifier));
}

export function dirnameOf(path: string): string {
  return posix.dirname(path.replace(/\\/g, '/'));
}

/**
 * Strip one trailing source extension from the given list.
 */
export function stripExtension(path: string, extensions: readonly string[]): string {
  if (extensions.length === 0) return path;
  const pattern = new RegExp(`(?:${extensions.map(escapeRegex).join('|')})$`);
  return path.replace(pattern, '');
}

/**
 * Strip whatever final extension a path has: `src/App.vue` → `src/App`.
 */
export function stripFinalExtension(path: string): string {
  const ext = posix.extname(path);
  return ext ? path.slice(0, -ext.length) : path;
}

/**
 * Checks if `suffix` is the whole of `path` or its tail after a `/`.
 *
 * Avoids false positives like:
 * - "logger" matching "mylogger" ❌
 * - "utils/logger" matching "src/myutils/logger" ❌
 */
export function endsAtBoundary(path: string, suffix: string): boolean {
  return path === suffix || path.endsWith('/' + suffix);
}

/**
 * Convert a dotted module name to a slash path: `django.http` → `django/http`.
 */
export function moduleToPath(module: string): string {
  return module.replace(/\./g, '/');
}

/**
 * Translate a dotted relative specifier into a slash path.
 *
 * - `.mod` → `./mod`
 * - `..pkg.mod` → `../pkg/mod`
 * - `.` → `./`
 *
 * Specifiers that already contain a `/` are returned unchanged.
 */
export function relativeSpecifierToPath(specifier: string): string {
  if (specifier.includes('/')) return specifier;

  const match = /^(\.+)(.*)$/.exec(specifier);
  if (!match) return specifier;

  const level = match[1].length;
  const prefix = level === 1 ? './' : '../'.repeat(level - 1);
  return prefix + moduleToPath(match[2]);
}
