/**
 * Command-line argument parsing
 *
 * Options take their value as the next argument or after `=`:
 * `--port 9180` and `--port=9180` are the same.
 */

import { Errors } from '../errors/index.js'
import { DEFAULT_NAMESPACE } from '../exposition/scrape.js'

/** Raw harness settings as typed on the command line, validated later */
export interface CliInput {
  exporterPath?: string
  definitionsPath?: string
  host?: string
  port?: string
  smp?: string
  prometheusUrl?: string
  scrapeIntervalSeconds?: string
  namespace?: { prefix: string; group: string }
}

export interface ParsedArgs {
  help: boolean
  input: CliInput
}

type ValueOption = Exclude<keyof CliInput, 'namespace'> | 'prefix' | 'group'

const VALUE_OPTIONS = new Map<string, ValueOption>([
  ['--exporter', 'exporterPath'],
  ['--config', 'definitionsPath'],
  ['--host', 'host'],
  ['--port', 'port'],
  ['--smp', 'smp'],
  ['--prometheus', 'prometheusUrl'],
  ['--prometheus-scrape-interval', 'scrapeIntervalSeconds'],
  ['--prefix', 'prefix'],
  ['--group', 'group'],
])

function usageError(reason: string) {
  return Errors.invalidConfig([{ field: 'argv', reason }])
}

/**
 * Turn argv (without the node and script entries) into harness input
 *
 * @throws ExpocheckError INVALID_CONFIG on unknown options and missing values
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const input: CliInput = {}
  let prefix: string | undefined
  let group: string | undefined
  let help = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === '--help' || arg === '-h') {
      help = true
      continue
    }

    const eq = arg.indexOf('=')
    const flag = eq === -1 ? arg : arg.slice(0, eq)
    const option = VALUE_OPTIONS.get(flag)
    if (option === undefined) {
      throw usageError(`Unknown option '${arg}'`)
    }

    let value: string | undefined
    if (eq !== -1) {
      value = arg.slice(eq + 1)
    } else {
      value = argv[i + 1]
      i++
    }
    if (value === undefined || value === '') {
      throw usageError(`Option '${flag}' requires a value`)
    }

    switch (option) {
      case 'prefix':
        prefix = value
        break
      case 'group':
        group = value
        break
      default:
        input[option] = value
    }
  }

  if (prefix !== undefined || group !== undefined) {
    input.namespace = {
      prefix: prefix ?? DEFAULT_NAMESPACE.prefix,
      group: group ?? DEFAULT_NAMESPACE.group,
    }
  }

  return { help, input }
}

export const HELP_TEXT = `
Usage: expocheck --exporter <path> --config <yaml> [options]

Starts a metrics exporter, scrapes its Prometheus text endpoint and checks
the output against the metric definitions it was started with.

Options:
  --exporter <path>                  Exporter executable (required)
  --config <path>                    Metric definitions YAML (required)
  --host <host>                      Host the exporter listens on (default: localhost)
  --port <port>                      Port the exporter listens on (default: 10001)
  --smp <n>                          Exporter shard count (default: 2)
  --prometheus <url>                 Prometheus scraping the exporter, enables parity checks
  --prometheus-scrape-interval <s>   Prometheus scrape interval in seconds (default: 15)
  --prefix <prefix>                  Metric name prefix (default: seastar)
  --group <group>                    Metric group (default: test_group)
  -h, --help                         Show this help message

Exit codes:
  0  every check passed or was skipped
  1  a check failed or the exporter did not start
  2  invalid arguments, settings or definitions

Environment:
  LOG_LEVEL   pino log level (default: debug, info in production)
`
