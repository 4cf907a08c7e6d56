/**
 * One harness run: validate settings, start the exporter, run the checks,
 * always stop the exporter.
 */

import { setTimeout as delay } from 'node:timers/promises'
import { runChecks, summarize, type CheckResult, type CheckSummary } from '../checks/index.js'
import { MetricsEndpointClient } from '../client/endpoint.js'
import { PrometheusClient } from '../client/prometheus.js'
import { startExporter, type ExporterHandle, type ExporterOptions } from '../client/process.js'
import {
  exporterBaseUrl,
  loadDefinitions,
  parseHarnessConfig,
  type HarnessConfig,
  type MetricDefinition,
} from '../config/index.js'
import { ExpocheckError } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { HELP_TEXT, parseArgs } from './args.js'

const logger = createLogger('cli')

export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_USAGE = 2

export interface RunDependencies {
  startExporter: (options: ExporterOptions) => Promise<ExporterHandle>
  sleep: (ms: number) => Promise<void>
  out: (line: string) => void
  err: (line: string) => void
}

const defaultDependencies: RunDependencies = {
  startExporter,
  sleep: (ms) => delay(ms),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

export function formatResult(result: CheckResult): string {
  switch (result.status) {
    case 'passed':
      return `✓ ${result.name}`
    case 'failed':
      return `✗ ${result.name}: ${result.message ?? 'failed'}`
    case 'skipped':
      return `- ${result.name} (skipped${result.message ? `: ${result.message}` : ''})`
  }
}

export function formatSummary(summary: CheckSummary): string {
  return `${summary.total} checks: ${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`
}

/**
 * Run the harness for the given arguments and resolve with the exit code
 */
export async function run(
  argv: readonly string[],
  overrides: Partial<RunDependencies> = {}
): Promise<number> {
  const deps: RunDependencies = { ...defaultDependencies, ...overrides }

  let config: HarnessConfig
  let definitions: MetricDefinition[]
  try {
    const args = parseArgs(argv)
    if (args.help) {
      deps.out(HELP_TEXT)
      return EXIT_OK
    }
    config = parseHarnessConfig(args.input)
    definitions = await loadDefinitions(config.definitionsPath)
  } catch (err) {
    if (err instanceof ExpocheckError && err.category === 'config') {
      deps.err(`${err.code}: ${err.message}`)
      deps.err('Run with --help for usage.')
      return EXIT_USAGE
    }
    throw err
  }

  let exporter: ExporterHandle
  try {
    exporter = await deps.startExporter({
      exporterPath: config.exporterPath,
      definitionsPath: config.definitionsPath,
      port: config.port,
      smp: config.smp,
      startTimeoutMs: config.startTimeoutMs,
    })
  } catch (err) {
    if (err instanceof ExpocheckError) {
      logger.error({ code: err.code, details: err.details }, err.message)
      deps.err(`${err.code}: ${err.message}`)
      return EXIT_FAILED
    }
    throw err
  }

  try {
    const results = await runChecks({
      endpoint: new MetricsEndpointClient({
        baseUrl: exporterBaseUrl(config),
        namespace: config.namespace,
      }),
      prometheus: config.prometheusUrl ? new PrometheusClient({ baseUrl: config.prometheusUrl }) : undefined,
      definitions,
      namespace: config.namespace,
      labelFilter: config.labelFilter,
      scrapeIntervalSeconds: config.scrapeIntervalSeconds,
      sleep: deps.sleep,
    })

    for (const result of results) {
      deps.out(formatResult(result))
    }
    const summary = summarize(results)
    deps.out(formatSummary(summary))

    return summary.failed > 0 ? EXIT_FAILED : EXIT_OK
  } finally {
    await exporter.stop()
  }
}
