/**
 * Exposition Module
 *
 * Prometheus text exposition parsing with histogram reconstruction.
 */

export { bucketOf, valuesToHistogram, SUB_BUCKETS_PER_OCTAVE } from './buckets.js'
export { parseLine, parseLabels, parseSampleValue } from './line-parser.js'
export { labelsEqual, labelsToKey, omitLabels } from './labels.js'
export {
  scalarRecord,
  histogramRecord,
  histogramFromBuckets,
  bucketsEqual,
  valuesEqual,
  recordsEqual,
  sameRecords,
  describeRecord,
  describeValue,
} from './record.js'
export { parseExposition, advance, INITIAL_STATE } from './stream-parser.js'
export type { ParserState, Transition, HistogramAccumulator } from './stream-parser.js'
export {
  MetricsScrape,
  DEFAULT_NAMESPACE,
  groupName,
  qualifiedName,
  type MetricNamespace,
} from './scrape.js'

export type {
  MetricType,
  Labels,
  BucketCounts,
  ScalarRecord,
  HistogramRecord,
  ExpositionRecord,
  CumulativeBucket,
  ExpositionLine,
  BlankLine,
  CommentLine,
  HelpLine,
  TypeLine,
  SampleLine,
  RecordFilter,
} from './types.js'

export { METRIC_TYPES } from './types.js'
