import { describe, it, expect } from 'vitest'
import {
  scalarRecord,
  histogramRecord,
  histogramFromBuckets,
  recordsEqual,
  valuesEqual,
  sameRecords,
  describeRecord,
} from './record.js'

describe('record constructors', () => {
  it('should create frozen scalar records', () => {
    const record = scalarRecord('seastar_test_group_gauge_1', 2, { shard: '0' })
    expect(record).toEqual({
      kind: 'scalar',
      name: 'seastar_test_group_gauge_1',
      labels: { shard: '0' },
      value: 2,
    })
    expect(Object.isFrozen(record)).toBe(true)
    expect(Object.isFrozen(record.labels)).toBe(true)
  })

  it('should copy the bucket map of histogram records', () => {
    const buckets = new Map([[3, 1]])
    const record = histogramRecord('h', buckets)
    buckets.set(5, 1)
    expect(record.buckets.size).toBe(1)
    expect(record.labels).toEqual({})
  })
})

describe('histogramFromBuckets', () => {
  it('should turn cumulative counts into per-bucket deltas', () => {
    const record = histogramFromBuckets('h', [
      { le: 4, count: 3 },
      { le: 16, count: 5 },
    ])
    expect(record.kind).toBe('histogram')
    expect(record.buckets).toEqual(
      new Map([
        [3, 3],
        [14, 2],
      ])
    )
  })

  it('should add deltas that share a bucket', () => {
    // 9 - 1 = 8 and 9.5 - 1 = 8.5 both fall in [8, 10)
    const record = histogramFromBuckets('h', [
      { le: 9, count: 1 },
      { le: 9.5, count: 4 },
    ])
    expect(record.buckets).toEqual(new Map([[8, 4]]))
  })

  it('should return an empty histogram for no buckets', () => {
    expect(histogramFromBuckets('h', []).buckets.size).toBe(0)
  })
})

describe('recordsEqual', () => {
  const buckets = new Map([
    [3, 3],
    [14, 2],
  ])

  it('should ignore name and labels', () => {
    const a = histogramRecord('from_config', buckets)
    const b = histogramRecord('from_exposition', new Map(buckets), { shard: '1' })
    expect(recordsEqual(a, b)).toBe(true)
  })

  it('should compare histogram values', () => {
    const a = histogramRecord('h', buckets)
    const b = histogramRecord('h', new Map([[3, 3], [14, 1]]))
    const c = histogramRecord('h', new Map([[3, 3]]))
    expect(recordsEqual(a, b)).toBe(false)
    expect(recordsEqual(a, c)).toBe(false)
  })

  it('should compare scalar values regardless of labels', () => {
    expect(recordsEqual(scalarRecord('a', 1, { x: '1' }), scalarRecord('b', 1))).toBe(true)
    expect(recordsEqual(scalarRecord('a', 1), scalarRecord('a', 2))).toBe(false)
  })

  it('should never equate a scalar with a histogram', () => {
    expect(recordsEqual(scalarRecord('a', 0), histogramRecord('a', new Map()))).toBe(false)
  })
})

describe('valuesEqual', () => {
  it('should compare a record with a raw value', () => {
    expect(valuesEqual(scalarRecord('a', 3), 3)).toBe(true)
    expect(valuesEqual(scalarRecord('a', 3), new Map([[3, 1]]))).toBe(false)
    expect(valuesEqual(histogramRecord('h', new Map([[1, 2]])), new Map([[1, 2]]))).toBe(true)
    expect(valuesEqual(histogramRecord('h', new Map([[1, 2]])), 2)).toBe(false)
  })
})

describe('sameRecords', () => {
  it('should match records in any order', () => {
    const actual = [scalarRecord('a', 1), scalarRecord('b', 2)]
    const expected = [scalarRecord('x', 2), scalarRecord('y', 1)]
    expect(sameRecords(actual, expected)).toBe(true)
  })

  it('should respect multiplicity', () => {
    const actual = [scalarRecord('a', 1), scalarRecord('b', 1)]
    expect(sameRecords(actual, [scalarRecord('a', 1)])).toBe(false)
    expect(sameRecords([scalarRecord('a', 1)], actual)).toBe(false)
  })

  it('should treat two empty collections as equal', () => {
    expect(sameRecords([], [])).toBe(true)
  })
})

describe('describeRecord', () => {
  it('should format scalars and histograms', () => {
    expect(describeRecord(scalarRecord('a', 1, { shard: '0' }))).toBe('a{shard="0"} 1')
    expect(describeRecord(histogramRecord('h', new Map([[3, 3], [14, 2]])))).toBe(
      'h{} {3: 3, 14: 2}'
    )
  })
})
