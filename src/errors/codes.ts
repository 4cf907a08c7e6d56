/**
 * Error Codes
 *
 * Central definition of all expocheck error codes. Every code belongs to a
 * category that tells callers where the failure came from:
 *
 * - parse:    the exposition text does not follow the expected format
 * - contract: a caller broke a function's input contract
 * - config:   a definitions file or harness setting is invalid
 * - io:       the exporter, its endpoint or Prometheus misbehaved
 */

/** Where an error originated */
export type ErrorCategory = 'parse' | 'contract' | 'config' | 'io'

/**
 * Error code definition with string identifier and category
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'MALFORMED_LINE') */
  code: string
  category: ErrorCategory
  /** Default message */
  message: string
}

/**
 * All expocheck error codes
 */
export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // Parse errors
  // ─────────────────────────────────────────────────────────────

  /** Line matches neither a comment header nor the sample grammar */
  MALFORMED_LINE: {
    code: 'MALFORMED_LINE',
    category: 'parse',
    message: 'Malformed exposition line',
  },

  /** Histogram sample that is not _bucket, _sum or _count */
  UNKNOWN_HISTOGRAM_COMPONENT: {
    code: 'UNKNOWN_HISTOGRAM_COMPONENT',
    category: 'parse',
    message: 'Unknown histogram component',
  },

  /** Sample is missing a label the parser relies on (le) */
  MISSING_LABEL: {
    code: 'MISSING_LABEL',
    category: 'parse',
    message: 'Missing label',
  },

  /** Metric type that is declared but not handled (summary) */
  UNSUPPORTED_TYPE: {
    code: 'UNSUPPORTED_TYPE',
    category: 'parse',
    message: 'Unsupported metric type',
  },

  // ─────────────────────────────────────────────────────────────
  // Contract violations
  // ─────────────────────────────────────────────────────────────

  /** Bucket mapping requires a positive finite value */
  INVALID_BUCKET_VALUE: {
    code: 'INVALID_BUCKET_VALUE',
    category: 'contract',
    message: 'Bucket value must be positive and finite',
  },

  // ─────────────────────────────────────────────────────────────
  // Configuration errors
  // ─────────────────────────────────────────────────────────────

  /** Metric definitions file is not valid */
  INVALID_DEFINITION: {
    code: 'INVALID_DEFINITION',
    category: 'config',
    message: 'Invalid metric definition',
  },

  /** Harness settings are not valid */
  INVALID_CONFIG: {
    code: 'INVALID_CONFIG',
    category: 'config',
    message: 'Invalid configuration',
  },

  // ─────────────────────────────────────────────────────────────
  // I/O errors
  // ─────────────────────────────────────────────────────────────

  /** HTTP request failed or returned a non-2xx status */
  ENDPOINT_ERROR: {
    code: 'ENDPOINT_ERROR',
    category: 'io',
    message: 'Endpoint request failed',
  },

  /** Response body does not have the expected shape */
  INVALID_RESPONSE: {
    code: 'INVALID_RESPONSE',
    category: 'io',
    message: 'Invalid response',
  },

  /** Exporter process could not be started */
  EXPORTER_FAILED: {
    code: 'EXPORTER_FAILED',
    category: 'io',
    message: 'Exporter failed',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  // Unrecognized codes are treated as I/O failures
  return {
    code,
    category: 'io',
    message: code,
  }
}

/**
 * Get the category for a string code
 */
export function getCategoryForCode(code: string): ErrorCategory {
  return getErrorCode(code).category
}

/**
 * Check if a code describes malformed exposition input
 */
export function isParseError(code: string): boolean {
  return getCategoryForCode(code) === 'parse'
}

/**
 * Check if a code describes a failure of an external collaborator
 */
export function isIoError(code: string): boolean {
  return getCategoryForCode(code) === 'io'
}
