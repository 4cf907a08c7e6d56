/**
 * expocheck - Prometheus text exposition parsing and exporter verification
 *
 * Parses `/metrics` pages into typed records, rebuilds histograms from
 * cumulative buckets, and checks a running exporter against the metric
 * definitions it was configured with.
 */

// === Exposition ===
export {
  bucketOf,
  valuesToHistogram,
  SUB_BUCKETS_PER_OCTAVE,
  parseLine,
  parseLabels,
  parseSampleValue,
  labelsEqual,
  labelsToKey,
  omitLabels,
  scalarRecord,
  histogramRecord,
  histogramFromBuckets,
  bucketsEqual,
  valuesEqual,
  recordsEqual,
  sameRecords,
  describeRecord,
  describeValue,
  parseExposition,
  advance,
  INITIAL_STATE,
  MetricsScrape,
  DEFAULT_NAMESPACE,
  groupName,
  qualifiedName,
  METRIC_TYPES,
} from './exposition/index.js'
export type {
  MetricNamespace,
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
  ParserState,
  Transition,
  HistogramAccumulator,
} from './exposition/index.js'

// === Errors ===
export {
  Errors,
  ExpocheckError,
  ErrorCodes,
  getErrorCode,
  getCategoryForCode,
  isParseError,
  isIoError,
} from './errors/index.js'
export type { ErrorCategory, ErrorCodeDef } from './errors/index.js'

// === Config ===
export {
  parseDefinitions,
  loadDefinitions,
  recordFromDefinition,
  expectedRecords,
  metricDefinitionSchema,
  definitionsFileSchema,
  parseHarnessConfig,
  exporterBaseUrl,
  harnessConfigSchema,
} from './config/index.js'
export type { MetricDefinition, HarnessConfig, HarnessConfigInput } from './config/index.js'

// === Clients ===
export {
  MetricsEndpointClient,
  buildMetricsQuery,
  fetchText,
  PrometheusClient,
  fromNativeHistogram,
  parseQueryResponse,
  queryResponseSchema,
  startExporter,
  exporterArgs,
} from './client/index.js'
export type {
  MetricsQuery,
  MetricsEndpointOptions,
  NativeBucket,
  PrometheusClientOptions,
  ExporterOptions,
  ExporterHandle,
} from './client/index.js'

// === Checks ===
export {
  runChecks,
  summarize,
  DEFAULT_CHECKS,
  LABEL_FILTER_CASES,
  AGGREGATED_COUNTER,
  labelFilteringSansAggregation,
  labelFilteringWithAggregation,
  aggregation,
  help,
  prometheusParity,
} from './checks/index.js'
export type {
  Check,
  CheckContext,
  CheckOutcome,
  CheckResult,
  CheckStatus,
  CheckSummary,
  MetricsSource,
  NativeQuerySource,
} from './checks/index.js'

// === Utils ===
export { createLogger, getLogger } from './utils/index.js'
