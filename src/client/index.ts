/**
 * Client Module
 *
 * HTTP clients for the exporter and Prometheus, and the exporter process runner.
 */

export {
  MetricsEndpointClient,
  buildMetricsQuery,
  fetchText,
  type MetricsQuery,
  type MetricsEndpointOptions,
} from './endpoint.js'

export {
  PrometheusClient,
  fromNativeHistogram,
  parseQueryResponse,
  queryResponseSchema,
  type NativeBucket,
  type PrometheusClientOptions,
} from './prometheus.js'

export {
  startExporter,
  exporterArgs,
  type ExporterOptions,
  type ExporterHandle,
} from './process.js'
