/**
 * Error codes for all SourceLens-specific errors.
 * Used to identify error types programmatically.
 */
export enum LensErrorCode {
  // Caller contract
  INVALID_INPUT = 'INVALID_INPUT',

  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Languages
  UNSUPPORTED_LANGUAGE = 'UNSUPPORTED_LANGUAGE',
}
