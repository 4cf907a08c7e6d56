import { getCategoryForCode, type ErrorCategory } from './codes.js'

/**
 * Error raised by every expocheck module
 */
export class ExpocheckError extends Error {
  public readonly category: ErrorCategory

  constructor(
    /** String error code (e.g., 'MALFORMED_LINE') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message)
    this.name = 'ExpocheckError'
    this.category = getCategoryForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; category: ErrorCategory; message: string; details?: unknown } {
    return {
      code: this.code,
      category: this.category,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}
