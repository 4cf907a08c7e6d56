/**
 * Exposition Records
 *
 * Constructors and value equality for records. Equality deliberately ignores
 * `name` and `labels`: a histogram rebuilt from raw values and one rebuilt
 * from exposition counters agree on bucket occupancy, not on labels.
 */

import { bucketOf } from './buckets.js'
import type {
  BucketCounts,
  CumulativeBucket,
  ExpositionRecord,
  HistogramRecord,
  Labels,
  ScalarRecord,
} from './types.js'

/**
 * Create a scalar record
 */
export function scalarRecord(name: string, value: number, labels: Labels = {}): ScalarRecord {
  const record: ScalarRecord = {
    kind: 'scalar',
    name,
    labels: Object.freeze({ ...labels }),
    value,
  }
  return Object.freeze(record)
}

/**
 * Create a histogram record from per-bucket counts
 */
export function histogramRecord(
  name: string,
  buckets: BucketCounts,
  labels: Labels = {}
): HistogramRecord {
  const record: HistogramRecord = {
    kind: 'histogram',
    name,
    labels: Object.freeze({ ...labels }),
    buckets: new Map(buckets),
  }
  return Object.freeze(record)
}

/**
 * Rebuild per-bucket occupancy from cumulative `_bucket` counters.
 *
 * Each bucket's occupancy is the difference to the previous cumulative count
 * and is keyed by `bucketOf(le - 1)`; the exporter reports inclusive upper
 * bounds. Deltas that land on the same key are added together.
 */
export function histogramFromBuckets(
  name: string,
  cumulative: readonly CumulativeBucket[]
): HistogramRecord {
  const buckets = new Map<number, number>()
  let last = 0

  for (const { le, count } of cumulative) {
    const delta = count - last
    last = count
    const key = bucketOf(le - 1)
    buckets.set(key, (buckets.get(key) ?? 0) + delta)
  }

  return histogramRecord(name, buckets)
}

/**
 * Compare two bucket maps key by key
 */
export function bucketsEqual(a: BucketCounts, b: BucketCounts): boolean {
  if (a.size !== b.size) return false
  for (const [bucket, count] of a) {
    if (b.get(bucket) !== count) return false
  }
  return true
}

/**
 * Compare a record's value against a plain scalar or bucket map
 */
export function valuesEqual(record: ExpositionRecord, value: number | BucketCounts): boolean {
  if (record.kind === 'scalar') {
    return typeof value === 'number' && record.value === value
  }
  return typeof value !== 'number' && bucketsEqual(record.buckets, value)
}

/**
 * Value equality: name and labels are not compared
 */
export function recordsEqual(a: ExpositionRecord, b: ExpositionRecord): boolean {
  return valuesEqual(a, b.kind === 'scalar' ? b.value : b.buckets)
}

/**
 * Multiset comparison under recordsEqual: same size, and every expected
 * record is matched by a distinct actual record, in any order.
 */
export function sameRecords(
  actual: Iterable<ExpositionRecord>,
  expected: Iterable<ExpositionRecord>
): boolean {
  const remaining = [...actual]

  for (const record of expected) {
    const index = remaining.findIndex((candidate) => recordsEqual(candidate, record))
    if (index === -1) return false
    remaining.splice(index, 1)
  }

  return remaining.length === 0
}

export function describeValue(value: number | BucketCounts): string {
  if (typeof value === 'number') return String(value)
  return `{${[...value].map(([bucket, count]) => `${bucket}: ${count}`).join(', ')}}`
}

/**
 * Human-readable form for logs and check messages
 */
export function describeRecord(record: ExpositionRecord): string {
  const labels = Object.entries(record.labels)
    .map(([k, v]) => `${k}="${v}"`)
    .join(',')
  const value = describeValue(record.kind === 'scalar' ? record.value : record.buckets)
  return `${record.name}{${labels}} ${value}`
}
