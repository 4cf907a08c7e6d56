#!/usr/bin/env node
/**
 * expocheck CLI
 *
 * Usage:
 *   expocheck --exporter ./prometheus_test_exporter --config conf.yaml
 *   expocheck --exporter ./exporter --config conf.yaml --prometheus http://localhost:9090
 *   expocheck --help
 */

import { createLogger } from '../utils/logger.js'
import { run } from './run.js'

const logger = createLogger('cli')

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Unexpected error')
    console.error(error)
    process.exitCode = 1
  })
