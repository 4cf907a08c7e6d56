/**
 * Harness Configuration
 *
 * Settings for one verification run: where the exporter binary and its
 * definitions live, how to reach it, and the optional Prometheus that scrapes
 * it.
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'
import { DEFAULT_NAMESPACE } from '../exposition/scrape.js'

export const harnessConfigSchema = z.object({
  exporterPath: z.string().min(1),
  definitionsPath: z.string().min(1),
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(10001),
  /** Number of exporter shards (`--smp`) */
  smp: z.coerce.number().int().min(1).default(2),
  /** Prometheus base URL, e.g. http://localhost:9090 */
  prometheusUrl: z.string().url().optional(),
  scrapeIntervalSeconds: z.coerce.number().nonnegative().default(15),
  namespace: z
    .object({
      prefix: z.string().min(1),
      group: z.string().min(1),
    })
    .default({ ...DEFAULT_NAMESPACE }),
  /** Label set the filtering and parity checks select */
  labelFilter: z.record(z.string()).default({ private: '1' }),
  /** Milliseconds to wait for the exporter's readiness line */
  startTimeoutMs: z.coerce.number().int().positive().default(30_000),
})

export type HarnessConfig = z.infer<typeof harnessConfigSchema>
export type HarnessConfigInput = z.input<typeof harnessConfigSchema>

/**
 * Validate harness settings and fill in defaults
 *
 * @throws ExpocheckError INVALID_CONFIG listing every failing field
 */
export function parseHarnessConfig(input: unknown): HarnessConfig {
  const result = harnessConfigSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidConfig(
      result.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.') || 'root',
        reason: issue.message,
      }))
    )
  }
  return result.data
}

/**
 * Base URL of the exporter's HTTP server
 */
export function exporterBaseUrl(config: HarnessConfig): string {
  return `http://${config.host}:${config.port}`
}
