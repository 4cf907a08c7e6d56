/**
 * Error Module
 *
 * Error class, error code definitions and pre-built factories.
 */

export { Errors } from './factories.js'
export { ExpocheckError } from './error.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  type ErrorCategory,
  getErrorCode,
  getCategoryForCode,
  isParseError,
  isIoError,
} from './codes.js'
