import { ConfigError } from '../errors/index.js';
import { analysisConfigSchema } from './schema.js';
import type { AnalysisConfig, AnalysisConfigInput } from './schema.js';

/**
 * Validate overrides and fill in defaults.
 *
 * @throws ConfigError when the overrides do not match the schema
 */
export function createConfig(overrides: AnalysisConfigInput = {}): AnalysisConfig {
  const result = analysisConfigSchema.safeParse(overrides);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid analysis config:\n  ${issues.join('\n  ')}`, { issues });
  }
  return result.data;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigError(
    `Invalid ${name} environment variable: "${value}"\n` +
    `Valid values: 'true' or 'false'`,
    { variable: name }
  );
}

/**
 * Build config overrides from environment variables.
 *
 * - SOURCELENS_RESOLVE_EXTENSIONS: comma-separated, e.g. ".ts,.js"
 * - SOURCELENS_INDEX_FILES: comma-separated, e.g. "index.ts,__init__.py"
 * - SOURCELENS_UNUSED_INCLUDE_EXPORTED: "true" | "false"
 *
 * Only the given mapping is read; pass `process.env` explicitly.
 */
export function configFromEnv(env: Record<string, string | undefined>): AnalysisConfigInput {
  const overrides: AnalysisConfigInput = {};

  const extensions = env.SOURCELENS_RESOLVE_EXTENSIONS;
  const indexFiles = env.SOURCELENS_INDEX_FILES;
  if (extensions !== undefined || indexFiles !== undefined) {
    overrides.resolution = {
      ...(extensions !== undefined ? { extensions: parseList(extensions) } : {}),
      ...(indexFiles !== undefined ? { indexFiles: parseList(indexFiles) } : {}),
    };
  }

  const includeExported = env.SOURCELENS_UNUSED_INCLUDE_EXPORTED;
  if (includeExported !== undefined) {
    overrides.unused = {
      includeExported: parseBoolean('SOURCELENS_UNUSED_INCLUDE_EXPORTED', includeExported),
    };
  }

  return overrides;
}
