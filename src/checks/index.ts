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
} from './suite.js'

export type {
  Check,
  CheckContext,
  CheckOutcome,
  CheckResult,
  CheckStatus,
  CheckSummary,
  MetricsSource,
  NativeQuerySource,
} from './types.js'
