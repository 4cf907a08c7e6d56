/**
 * Prometheus Query Client
 *
 * Reads back what a Prometheus server scraped from the exporter, so the
 * exporter's protobuf/native-histogram output can be compared with the
 * definitions. Only instant queries are needed.
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'
import { bucketOf } from '../exposition/buckets.js'
import type { BucketCounts, MetricType } from '../exposition/types.js'
import { createLogger } from '../utils/logger.js'
import { fetchText } from './endpoint.js'

const logger = createLogger('prometheus-client')

const numericString = z.string().transform((value, ctx) => {
  const parsed = Number(value)
  if (value.trim() === '' || Number.isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a number` })
    return z.NEVER
  }
  return parsed
})

/** `[boundary_rule, lower, upper, count]` */
const nativeBucketSchema = z.tuple([z.number(), numericString, numericString, numericString])

const sampleSchema = z.object({
  value: z.tuple([z.number(), numericString]).optional(),
  histogram: z
    .tuple([
      z.number(),
      z.object({
        buckets: z.array(nativeBucketSchema).default([]),
      }),
    ])
    .optional(),
})

export const queryResponseSchema = z.object({
  status: z.string().optional(),
  data: z.object({
    result: z.array(sampleSchema),
  }),
})

export type NativeBucket = z.infer<typeof nativeBucketSchema>

/**
 * Rebuild a histogram from Prometheus native-histogram buckets.
 * Rows are keyed by their upper bound, mapped exactly like exposition `le`.
 */
export function fromNativeHistogram(buckets: readonly NativeBucket[]): Map<number, number> {
  const histogram = new Map<number, number>()
  for (const [, , upper, count] of buckets) {
    const bucket = bucketOf(upper - 1)
    histogram.set(bucket, (histogram.get(bucket) ?? 0) + count)
  }
  return histogram
}

/**
 * Extract the first sample of an instant-query response
 *
 * @throws ExpocheckError INVALID_RESPONSE when the body does not have the
 *   expected shape or the result is empty
 */
export function parseQueryResponse(body: unknown, type: MetricType): number | BucketCounts {
  const parsed = queryResponseSchema.safeParse(body)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw Errors.invalidResponse('prometheus', `${issue.path.join('.') || 'root'}: ${issue.message}`)
  }

  const [sample] = parsed.data.data.result
  if (!sample) {
    throw Errors.invalidResponse('prometheus', 'empty result')
  }

  if (type === 'histogram') {
    if (!sample.histogram) {
      throw Errors.invalidResponse('prometheus', 'result has no histogram')
    }
    return fromNativeHistogram(sample.histogram[1].buckets)
  }

  if (!sample.value) {
    throw Errors.invalidResponse('prometheus', 'result has no value')
  }
  return sample.value[1]
}

export interface PrometheusClientOptions {
  /** e.g. http://localhost:9090 */
  baseUrl: string
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number
}

export class PrometheusClient {
  private readonly baseUrl: string
  private readonly timeoutMs: number

  constructor(options: PrometheusClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? 10_000
  }

  /**
   * Run an instant query and decode its first sample
   */
  async query(expr: string, type: MetricType): Promise<number | BucketCounts> {
    const url = `${this.baseUrl}/api/v1/query?${new URLSearchParams({ query: expr })}`
    logger.debug({ url, type }, 'Querying Prometheus')

    const text = await fetchText(url, {
      timeoutMs: this.timeoutMs,
      headers: { Accept: 'application/json' },
    })

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (err) {
      throw Errors.invalidResponse('prometheus', err instanceof Error ? err.message : String(err))
    }
    return parseQueryResponse(body, type)
  }
}
