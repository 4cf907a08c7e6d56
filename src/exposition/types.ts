/**
 * Exposition Types
 *
 * Records produced by parsing Prometheus text exposition, and the line
 * shapes the line parser classifies input into.
 */

/** Types a `# TYPE` header can declare */
export type MetricType = 'counter' | 'gauge' | 'histogram' | 'summary' | 'untyped'

/** All accepted metric types, in declaration order */
export const METRIC_TYPES: readonly MetricType[] = [
  'counter',
  'gauge',
  'histogram',
  'summary',
  'untyped',
]

/** Label key-value pairs */
export type Labels = Record<string, string>

/** Canonical bucket lower bound → number of observations in that bucket */
export type BucketCounts = ReadonlyMap<number, number>

/** Gauge, counter or untyped sample */
export interface ScalarRecord {
  readonly kind: 'scalar'
  readonly name: string
  readonly labels: Readonly<Labels>
  readonly value: number
}

/** Histogram reconstructed into per-bucket occupancy */
export interface HistogramRecord {
  readonly kind: 'histogram'
  readonly name: string
  /** Always empty for reconstructed histograms */
  readonly labels: Readonly<Labels>
  readonly buckets: BucketCounts
}

/** One logical metric emitted by the stream parser */
export type ExpositionRecord = ScalarRecord | HistogramRecord

/** Cumulative `(le, count)` pair collected from `_bucket` lines */
export interface CumulativeBucket {
  le: number
  count: number
}

// ─────────────────────────────────────────────────────────────
// Parsed lines
// ─────────────────────────────────────────────────────────────

export interface BlankLine {
  kind: 'blank'
}

/** `#` line that is neither HELP nor TYPE */
export interface CommentLine {
  kind: 'comment'
  text: string
}

export interface HelpLine {
  kind: 'help'
  name: string
  text: string
}

export interface TypeLine {
  kind: 'type'
  name: string
  type: MetricType
}

export interface SampleLine {
  kind: 'sample'
  name: string
  labels: Labels
  value: number
}

export type ExpositionLine = BlankLine | CommentLine | HelpLine | TypeLine | SampleLine

/** Client-side filters applied to sample lines */
export interface RecordFilter {
  /** Fully-qualified name prefix a sample must start with */
  name?: string
  /** Label set a sample must equal exactly */
  labels?: Labels
}
