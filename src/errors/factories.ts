/**
 * Error Factories
 *
 * Pre-built error helpers for the failures the parser, the clients and the
 * configuration loaders raise. Each factory creates an ExpocheckError.
 *
 * @example
 * ```typescript
 * throw Errors.malformedLine('foo{bar} 1')
 * // Creates: { code: 'MALFORMED_LINE', category: 'parse', message: "Malformed metric line: foo{bar} 1" }
 * ```
 */

import { ExpocheckError } from './error.js'

export const Errors = {
  /**
   * Line that matches no exposition grammar
   * @param line - The offending line
   * @param reason - Optional narrower description
   */
  malformedLine(line: string, reason?: string): ExpocheckError {
    const message = reason
      ? `Malformed metric line (${reason}): ${line}`
      : `Malformed metric line: ${line}`
    return new ExpocheckError('MALFORMED_LINE', message, { line })
  },

  /**
   * Histogram sample whose suffix is not _bucket, _sum or _count
   * @param histogram - Name declared by the active TYPE header
   * @param line - The offending line
   */
  unknownHistogramComponent(histogram: string, line: string): ExpocheckError {
    return new ExpocheckError(
      'UNKNOWN_HISTOGRAM_COMPONENT',
      `Unknown histogram value for '${histogram}': ${line}`,
      { histogram, line }
    )
  },

  /**
   * Sample lacks a required label
   * @param label - Label name
   * @param metric - Metric the sample belongs to
   */
  missingLabel(label: string, metric: string): ExpocheckError {
    return new ExpocheckError(
      'MISSING_LABEL',
      `Metric '${metric}' is missing label '${label}'`,
      { label, metric }
    )
  },

  /**
   * Metric type that is known but not handled
   * @param type - Declared type
   */
  unsupportedType(type: string): ExpocheckError {
    return new ExpocheckError('UNSUPPORTED_TYPE', `Unsupported type: ${type}`, { type })
  },

  /**
   * Bucket mapping called outside its domain
   * @param value - Offending value
   */
  invalidBucketValue(value: number): ExpocheckError {
    return new ExpocheckError(
      'INVALID_BUCKET_VALUE',
      `Cannot map ${value} to a bucket: value must be positive and finite`,
      { value }
    )
  },

  /**
   * Invalid metric definitions
   * @param message - What was wrong
   * @param details - Optional position or issue list
   */
  invalidDefinition(message: string, details?: unknown): ExpocheckError {
    return new ExpocheckError('INVALID_DEFINITION', message, details)
  },

  /**
   * Invalid harness configuration
   * @param issues - Field paths with reasons
   */
  invalidConfig(issues: Array<{ field: string; reason: string }>): ExpocheckError {
    const message = issues.map((i) => `${i.field}: ${i.reason}`).join('; ')
    return new ExpocheckError('INVALID_CONFIG', message, { issues })
  },

  /**
   * HTTP request failure
   * @param url - Requested URL
   * @param status - Response status, absent on transport failures
   * @param cause - Underlying error message
   */
  endpoint(url: string, status?: number, cause?: string): ExpocheckError {
    let message = status !== undefined
      ? `GET ${url} returned HTTP ${status}`
      : `GET ${url} failed`
    if (cause) {
      message += `: ${cause}`
    }
    return new ExpocheckError('ENDPOINT_ERROR', message, { url, status })
  },

  /**
   * Response body with an unexpected shape
   * @param source - Who produced the response
   * @param reason - What was wrong with it
   */
  invalidResponse(source: string, reason: string): ExpocheckError {
    return new ExpocheckError('INVALID_RESPONSE', `Invalid response from ${source}: ${reason}`, {
      source,
    })
  },

  /**
   * Exporter process failure
   * @param reason - What happened
   * @param details - Optional exit code or signal
   */
  exporterFailed(reason: string, details?: unknown): ExpocheckError {
    return new ExpocheckError('EXPORTER_FAILED', `Exporter failed: ${reason}`, details)
  },
} as const
