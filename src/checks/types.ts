/**
 * Check Suite Types
 */

import type { MetricsQuery } from '../client/endpoint.js'
import type { MetricDefinition } from '../config/definitions.js'
import type { MetricNamespace, MetricsScrape } from '../exposition/scrape.js'
import type { BucketCounts, Labels, MetricType } from '../exposition/types.js'

/**
 * Anything that can serve a metrics page. MetricsEndpointClient in
 * production, an in-memory fake in tests.
 */
export interface MetricsSource {
  fetch(query?: MetricsQuery): Promise<MetricsScrape>
}

/**
 * Anything that answers instant queries. PrometheusClient in production.
 */
export interface NativeQuerySource {
  query(expr: string, type: MetricType): Promise<number | BucketCounts>
}

export interface CheckContext {
  endpoint: MetricsSource
  /** Absent when no Prometheus server is configured */
  prometheus?: NativeQuerySource
  definitions: readonly MetricDefinition[]
  namespace: MetricNamespace
  /** Label set the filtering and parity checks select on */
  labelFilter: Labels
  scrapeIntervalSeconds: number
  sleep: (ms: number) => Promise<void>
}

export type CheckStatus = 'passed' | 'failed' | 'skipped'

export interface CheckOutcome {
  status: CheckStatus
  message?: string
}

export interface CheckResult extends CheckOutcome {
  name: string
  /** Wall time of the check in milliseconds */
  durationMs: number
}

export interface Check {
  name: string
  run(context: CheckContext): Promise<CheckOutcome>
}

export interface CheckSummary {
  total: number
  passed: number
  failed: number
  skipped: number
}
