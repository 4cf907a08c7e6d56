/**
 * Exposition Stream Parser
 *
 * Walks exposition lines in order and emits one record per logical metric.
 * Histogram samples span several lines that share the context of the last
 * `# TYPE` header, so the scanner is an explicit state machine:
 *
 * - idle:      no histogram pending; samples become scalar records
 * - histogram: `_bucket`/`_sum`/`_count` lines of one series are being
 *              collected; flushed on the next TYPE header, on a new series
 *              or at end of input
 *
 * @example
 * ```typescript
 * for (const record of parseExposition(body.split('\n'), { name: 'seastar_test_group_counter_1' })) {
 *   console.log(record.value)
 * }
 * ```
 */

import { Errors } from '../errors/index.js'
import { parseLine, parseSampleValue } from './line-parser.js'
import { labelsEqual, labelsToKey, omitLabels } from './labels.js'
import { histogramFromBuckets, scalarRecord } from './record.js'
import type {
  CumulativeBucket,
  ExpositionLine,
  ExpositionRecord,
  MetricType,
  RecordFilter,
  SampleLine,
} from './types.js'

/** Lines collected for one histogram series */
export interface HistogramAccumulator {
  /** Name declared by the TYPE header */
  name: string
  /** Labels of the series without `le`; undefined until the first bucket */
  series?: string
  buckets: CumulativeBucket[]
  /** Advisory only, never checked against the buckets */
  sum: number
  /** Advisory only, never checked against the buckets */
  count: number
  /** At least one `_bucket` line passed the filters */
  touched: boolean
}

export type ParserState =
  | { mode: 'idle'; type?: MetricType }
  | { mode: 'histogram'; type: 'histogram' | 'summary'; accumulator: HistogramAccumulator }

export interface Transition {
  state: ParserState
  emitted: ExpositionRecord[]
}

export const INITIAL_STATE: ParserState = { mode: 'idle' }

function createAccumulator(name: string): HistogramAccumulator {
  return { name, buckets: [], sum: 0, count: 0, touched: false }
}

/**
 * Turn a pending accumulator into a record, if any of its `_bucket` lines
 * were kept
 */
function flush(state: ParserState): ExpositionRecord[] {
  if (state.mode !== 'histogram' || !state.accumulator.touched) {
    return []
  }
  const { name, buckets } = state.accumulator
  return [histogramFromBuckets(name, buckets)]
}

function passesFilter(sample: SampleLine, filter: RecordFilter): boolean {
  if (filter.name !== undefined && !sample.name.startsWith(filter.name)) {
    return false
  }
  if (filter.labels !== undefined && !labelsEqual(sample.labels, filter.labels)) {
    return false
  }
  return true
}

/**
 * Record one `_bucket` line. A line whose cumulative count equals the
 * previous one carries no observations and is dropped.
 */
function addBucket(
  state: Extract<ParserState, { mode: 'histogram' }>,
  sample: SampleLine,
  raw: string
): Transition {
  const series = labelsToKey(omitLabels(sample.labels, 'le'))
  const current = state.accumulator
  let emitted: ExpositionRecord[] = []
  let accumulator = current

  if (current.series !== undefined && current.series !== series) {
    emitted = flush(state)
    accumulator = createAccumulator(current.name)
  }
  accumulator.series = series
  accumulator.touched = true

  const last = accumulator.buckets.at(-1)?.count ?? 0
  if (sample.value - last !== 0) {
    const leLabel = sample.labels.le
    if (leLabel === undefined) {
      throw Errors.missingLabel('le', sample.name)
    }
    const le = parseSampleValue(leLabel)
    if (le === undefined) {
      throw Errors.malformedLine(raw, `invalid le '${leLabel}'`)
    }
    accumulator.buckets.push({ le, count: sample.value })
  }

  return { state: { ...state, accumulator }, emitted }
}

function handleSample(
  state: ParserState,
  sample: SampleLine,
  raw: string,
  filter: RecordFilter
): Transition {
  if (!passesFilter(sample, filter)) {
    return { state, emitted: [] }
  }

  if (state.mode === 'idle') {
    return { state, emitted: [scalarRecord(sample.name, sample.value, sample.labels)] }
  }

  if (state.type === 'summary') {
    throw Errors.unsupportedType('summary')
  }

  const { accumulator } = state
  switch (sample.name) {
    case `${accumulator.name}_bucket`:
      return addBucket(state, sample, raw)
    case `${accumulator.name}_sum`:
      accumulator.sum = sample.value
      return { state, emitted: [] }
    case `${accumulator.name}_count`:
      accumulator.count = sample.value
      return { state, emitted: [] }
    default:
      throw Errors.unknownHistogramComponent(accumulator.name, raw)
  }
}

/**
 * Advance the parser by one classified line.
 *
 * A pending histogram is flushed by the next TYPE header, and also by a
 * `_bucket` line whose labels (without `le`) differ from the series being
 * collected, so unaggregated per-shard histograms come out as separate
 * records. `_sum` and `_count` alone never make a histogram emit.
 *
 * The state passed in may be reused by the returned state; callers must
 * treat it as consumed.
 */
export function advance(
  state: ParserState,
  line: ExpositionLine,
  raw: string,
  filter: RecordFilter = {}
): Transition {
  switch (line.kind) {
    case 'blank':
    case 'comment':
    case 'help':
      return { state, emitted: [] }

    case 'type': {
      const emitted = flush(state)
      if (line.type === 'histogram' || line.type === 'summary') {
        return {
          state: { mode: 'histogram', type: line.type, accumulator: createAccumulator(line.name) },
          emitted,
        }
      }
      return { state: { mode: 'idle', type: line.type }, emitted }
    }

    case 'sample':
      return handleSample(state, line, raw, filter)
  }
}

/**
 * Parse exposition lines into records, lazily.
 *
 * Each call starts from a fresh state, so the same lines can be parsed any
 * number of times. The returned iterator itself can be consumed once.
 *
 * @throws ExpocheckError on malformed lines, unknown histogram components
 *   and summary samples
 */
export function* parseExposition(
  lines: Iterable<string>,
  filter: RecordFilter = {}
): Generator<ExpositionRecord, void, undefined> {
  let state: ParserState = INITIAL_STATE

  for (const raw of lines) {
    const transition = advance(state, parseLine(raw), raw, filter)
    state = transition.state
    yield* transition.emitted
  }

  yield* flush(state)
}
