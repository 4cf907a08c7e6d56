/**
 * Metrics Endpoint Client
 *
 * Fetches an exporter's `/metrics` page. The exporter filters server-side
 * through reserved query parameters:
 *
 * - `__name__=<name>`       only the metric family with that (group) name
 * - `__help__=false`        omit `# HELP` lines
 * - `__aggregate__=false`   one series per shard instead of summed series
 * - `<label>=<regex>`       only series whose label matches the regex
 */

import { Errors, ExpocheckError } from '../errors/index.js'
import { DEFAULT_NAMESPACE, MetricsScrape, type MetricNamespace } from '../exposition/scrape.js'
import type { Labels } from '../exposition/types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('endpoint-client')

export interface MetricsQuery {
  /** Group-qualified metric name for `__name__` */
  name?: string
  /** Label → regex pairs */
  labels?: Labels
  /** Include HELP lines (default: true) */
  withHelp?: boolean
  /** Let the exporter sum series across shards (default: true) */
  aggregate?: boolean
}

export interface MetricsEndpointOptions {
  /** e.g. http://localhost:10001 */
  baseUrl: string
  /** Path of the metrics page (default: '/metrics') */
  path?: string
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number
  namespace?: MetricNamespace
}

/**
 * Build the query string for a metrics request
 */
export function buildMetricsQuery(query: MetricsQuery = {}): URLSearchParams {
  const params = new URLSearchParams()
  if (query.name !== undefined) {
    params.set('__name__', query.name)
  }
  for (const [label, regex] of Object.entries(query.labels ?? {})) {
    params.set(label, regex)
  }
  if (query.withHelp === false) {
    params.set('__help__', 'false')
  }
  if (query.aggregate === false) {
    params.set('__aggregate__', 'false')
  }
  return params
}

/**
 * GET a URL and return its body as text
 *
 * @throws ExpocheckError ENDPOINT_ERROR on transport errors and non-2xx status
 */
export async function fetchText(
  url: string,
  init: { timeoutMs: number; headers?: Record<string, string> }
): Promise<string> {
  let response: Response
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: init.headers,
      signal: AbortSignal.timeout(init.timeoutMs),
    })
  } catch (err) {
    throw Errors.endpoint(url, undefined, err instanceof Error ? err.message : String(err))
  }

  // Read the body in every case so the connection is released
  const body = await response.text()
  if (!response.ok) {
    throw Errors.endpoint(url, response.status)
  }
  return body
}

export class MetricsEndpointClient {
  private readonly baseUrl: string
  private readonly path: string
  private readonly timeoutMs: number
  readonly namespace: MetricNamespace

  constructor(options: MetricsEndpointOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.path = options.path ?? '/metrics'
    this.timeoutMs = options.timeoutMs ?? 10_000
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE
  }

  /**
   * URL for a metrics request
   */
  url(query: MetricsQuery = {}): string {
    const params = buildMetricsQuery(query).toString()
    return params ? `${this.baseUrl}${this.path}?${params}` : `${this.baseUrl}${this.path}`
  }

  /**
   * Fetch one scrape of the metrics page
   */
  async fetch(query: MetricsQuery = {}): Promise<MetricsScrape> {
    const url = this.url(query)
    logger.debug({ url }, 'Fetching metrics')

    try {
      const body = await fetchText(url, { timeoutMs: this.timeoutMs })
      return MetricsScrape.fromBody(body, this.namespace)
    } catch (err) {
      if (err instanceof ExpocheckError) {
        logger.warn({ url, code: err.code }, err.message)
      }
      throw err
    }
  }
}
