/**
 * @sourcelens/core - shared plumbing for the SourceLens packages
 *
 * Errors, the logger contract, and the validated analysis configuration.
 */

// =============================================================================
// ERRORS
// =============================================================================

export {
  LensError,
  InvalidInputError,
  ConfigError,
  LensErrorCode,
  isLensError,
  getErrorMessage,
} from './errors/index.js';
export type { ErrorSeverity, LensErrorJSON } from './errors/index.js';

// =============================================================================
// LOGGING
// =============================================================================

export { consoleLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export { createConfig, configFromEnv } from './config/loader.js';
export {
  analysisConfigSchema,
  DEFAULT_RESOLVE_EXTENSIONS,
  DEFAULT_INDEX_FILES,
} from './config/schema.js';
export type { AnalysisConfig, AnalysisConfigInput } from './config/schema.js';
