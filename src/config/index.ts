/**
 * Configuration Module
 *
 * Metric definitions (what the exporter should expose) and harness settings
 * (how to run and reach it).
 */

export {
  parseDefinitions,
  loadDefinitions,
  recordFromDefinition,
  expectedRecords,
  metricDefinitionSchema,
  definitionsFileSchema,
  type MetricDefinition,
} from './definitions.js'

export {
  parseHarnessConfig,
  exporterBaseUrl,
  harnessConfigSchema,
  type HarnessConfig,
  type HarnessConfigInput,
} from './harness.js'
