/**
 * Utilities
 */

export { createLogger, getLogger } from './logger.js'
