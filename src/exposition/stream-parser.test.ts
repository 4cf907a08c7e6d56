import { describe, it, expect } from 'vitest'
import { parseExposition, advance, INITIAL_STATE } from './stream-parser.js'
import { parseLine } from './line-parser.js'
import { ExpocheckError } from '../errors/index.js'
import { captureError, lines } from '../test-helpers.js'
import type { ExpositionRecord } from './types.js'

const HISTOGRAM = lines(`
  # HELP seastar_test_group_hist_1 A histogram
  # TYPE seastar_test_group_hist_1 histogram
  seastar_test_group_hist_1_bucket{le="1.000000"} 0
  seastar_test_group_hist_1_bucket{le="2.000000"} 0
  seastar_test_group_hist_1_bucket{le="4.000000"} 3
  seastar_test_group_hist_1_bucket{le="8.000000"} 3
  seastar_test_group_hist_1_bucket{le="16.000000"} 5
  seastar_test_group_hist_1_bucket{le="+Inf"} 5
  seastar_test_group_hist_1_sum 40
  seastar_test_group_hist_1_count 5
`)

const COUNTERS = lines(`
  # TYPE seastar_test_group_counter_1 counter
  seastar_test_group_counter_1{shard="0"} 1.000000
  seastar_test_group_counter_1{shard="1"} 2.000000
`)

function values(records: Iterable<ExpositionRecord>): Array<number | Array<[number, number]>> {
  return [...records].map((r) => (r.kind === 'scalar' ? r.value : [...r.buckets]))
}

describe('parseExposition', () => {
  describe('scalars', () => {
    it('should emit one record per counter sample', () => {
      const records = [...parseExposition(COUNTERS)]
      expect(records).toEqual([
        {
          kind: 'scalar',
          name: 'seastar_test_group_counter_1',
          labels: { shard: '0' },
          value: 1,
        },
        {
          kind: 'scalar',
          name: 'seastar_test_group_counter_1',
          labels: { shard: '1' },
          value: 2,
        },
      ])
    })

    it('should reflect server-side aggregation as a single record', () => {
      const aggregated = lines(`
        # TYPE seastar_test_group_counter_1 counter
        seastar_test_group_counter_1 3.000000
      `)
      expect(values(parseExposition(aggregated))).toEqual([3])
    })

    it('should treat samples before any TYPE header as scalars', () => {
      expect(values(parseExposition(['up 1', '', 'load 0.5']))).toEqual([1, 0.5])
    })
  })

  describe('histograms', () => {
    it('should rebuild occupancy from cumulative buckets and drop empty ones', () => {
      const records = [...parseExposition(HISTOGRAM)]
      expect(records).toHaveLength(1)
      const [record] = records
      expect(record.kind).toBe('histogram')
      expect(record.name).toBe('seastar_test_group_hist_1')
      expect(record.labels).toEqual({})
      expect(record.kind === 'histogram' && record.buckets).toEqual(
        new Map([
          [3, 3],
          [14, 2],
        ])
      )
    })

    it('should flush the histogram when the next TYPE header arrives', () => {
      const records = [...parseExposition([...HISTOGRAM, ...COUNTERS])]
      expect(records.map((r) => r.kind)).toEqual(['histogram', 'scalar', 'scalar'])
    })

    it('should emit one record per series', () => {
      const perShard = lines(`
        # TYPE h histogram
        h_bucket{shard="0",le="2"} 1
        h_bucket{shard="0",le="4"} 1
        h_bucket{shard="0",le="+Inf"} 1
        h_sum{shard="0"} 1.5
        h_count{shard="0"} 1
        h_bucket{shard="1",le="2"} 0
        h_bucket{shard="1",le="4"} 2
        h_bucket{shard="1",le="+Inf"} 2
        h_sum{shard="1"} 6
        h_count{shard="1"} 2
      `)
      expect(values(parseExposition(perShard))).toEqual([[[1, 1]], [[3, 2]]])
    })

    it('should emit an empty histogram when no bucket changed', () => {
      const empty = lines(`
        # TYPE h histogram
        h_bucket{le="1"} 0
        h_bucket{le="+Inf"} 0
        h_sum 0
        h_count 0
      `)
      expect(values(parseExposition(empty))).toEqual([[]])
    })

    it('should emit nothing for a histogram that was filtered out', () => {
      const records = [...parseExposition([...HISTOGRAM, ...COUNTERS], {
        name: 'seastar_test_group_counter_1',
      })]
      expect(values(records)).toEqual([1, 2])
    })

    it('should emit nothing when only sum and count pass a label filter', () => {
      const labelled = lines(`
        # TYPE h histogram
        h_bucket{private="1",le="4"} 3
        h_bucket{private="1",le="+Inf"} 3
        h_sum{private="1"} 9
        h_count{private="1"} 3
      `)
      expect([...parseExposition(labelled, { labels: { private: '1' } })]).toEqual([])
    })

    it('should reject unknown histogram components', () => {
      const input = ['# TYPE h histogram', 'h_bucket{le="2"} 1', 'h_total 1']
      const error = captureError(() => [...parseExposition(input)])
      expect(error).toBeInstanceOf(ExpocheckError)
      expect(error).toMatchObject({ code: 'UNKNOWN_HISTOGRAM_COMPONENT' })
    })

    it('should reject a bucket without le', () => {
      const error = captureError(() => [...parseExposition(['# TYPE h histogram', 'h_bucket 1'])])
      expect(error).toMatchObject({ code: 'MISSING_LABEL' })
    })

    it('should reject observations above the last finite bound', () => {
      const input = ['# TYPE h histogram', 'h_bucket{le="4"} 1', 'h_bucket{le="+Inf"} 2']
      const error = captureError(() => [...parseExposition(input)])
      expect(error).toMatchObject({ code: 'INVALID_BUCKET_VALUE' })
    })
  })

  describe('summaries', () => {
    const summary = ['# TYPE s summary', 's{quantile="0.5"} 1', 's_sum 1', 's_count 1']

    it('should fail fast on summary samples', () => {
      const error = captureError(() => [...parseExposition(summary)])
      expect(error).toMatchObject({ code: 'UNSUPPORTED_TYPE', message: 'Unsupported type: summary' })
    })

    it('should not fail when the summary is filtered out', () => {
      expect([...parseExposition([...summary, ...COUNTERS], { name: 'seastar' })]).toHaveLength(2)
    })
  })

  describe('filters', () => {
    it('should keep samples whose name starts with the filter', () => {
      const input = [...COUNTERS, '# TYPE seastar_test_group_gauge_1 gauge', 'seastar_test_group_gauge_1 9']
      expect(values(parseExposition(input, { name: 'seastar_test_group_gauge' }))).toEqual([9])
    })

    it('should match label sets exactly', () => {
      expect(values(parseExposition(COUNTERS, { labels: { shard: '1' } }))).toEqual([2])
      expect([...parseExposition(COUNTERS, { labels: { shard: '0|1' } })]).toEqual([])
      expect([...parseExposition(COUNTERS, { labels: { shard: '"0"' } })]).toEqual([])
      expect([...parseExposition(COUNTERS, { labels: { shard: '0', extra: 'x' } })]).toEqual([])
      expect([...parseExposition(COUNTERS, { labels: {} })]).toEqual([])
    })
  })

  describe('laziness', () => {
    it('should yield records before reaching a malformed line', () => {
      const iterator = parseExposition([...COUNTERS, 'garbage'])
      expect(iterator.next().value).toMatchObject({ value: 1 })
      expect(iterator.next().value).toMatchObject({ value: 2 })
      expect(() => iterator.next()).toThrow(ExpocheckError)
    })

    it('should produce the same records on every pass', () => {
      const input = [...HISTOGRAM, ...COUNTERS]
      expect(values(parseExposition(input))).toEqual(values(parseExposition(input)))
    })
  })
})

describe('advance', () => {
  it('should enter histogram mode on a histogram TYPE header', () => {
    const line = '# TYPE h histogram'
    const { state, emitted } = advance(INITIAL_STATE, parseLine(line), line)
    expect(emitted).toEqual([])
    expect(state).toEqual({
      mode: 'histogram',
      type: 'histogram',
      accumulator: { name: 'h', buckets: [], sum: 0, count: 0, touched: false },
    })
  })

  it('should record sum and count without emitting', () => {
    let { state } = advance(INITIAL_STATE, parseLine('# TYPE h histogram'), '')
    state = advance(state, parseLine('h_sum 12.5'), '').state
    state = advance(state, parseLine('h_count 3'), '').state
    expect(state.mode === 'histogram' && state.accumulator).toMatchObject({
      sum: 12.5,
      count: 3,
      touched: false,
    })
  })

  it('should return to idle and flush on a gauge TYPE header', () => {
    let { state } = advance(INITIAL_STATE, parseLine('# TYPE h histogram'), '')
    state = advance(state, parseLine('h_bucket{le="2"} 4'), '').state
    const transition = advance(state, parseLine('# TYPE g gauge'), '')
    expect(transition.state).toEqual({ mode: 'idle', type: 'gauge' })
    expect(transition.emitted).toHaveLength(1)
  })
})
