import { describe, it, expect } from 'vitest'
import { parseLine, parseLabels, parseSampleValue } from './line-parser.js'
import { ExpocheckError } from '../errors/index.js'
import { captureError } from '../test-helpers.js'

describe('parseLine', () => {
  describe('samples', () => {
    it('should parse a sample with labels', () => {
      expect(parseLine('seastar_test_group_counter_1{shard="0"} 1.000000')).toEqual({
        kind: 'sample',
        name: 'seastar_test_group_counter_1',
        labels: { shard: '0' },
        value: 1,
      })
    })

    it('should parse a sample without a label block', () => {
      expect(parseLine('process_open_fds 2.5e3')).toEqual({
        kind: 'sample',
        name: 'process_open_fds',
        labels: {},
        value: 2500,
      })
    })

    it('should parse an empty label block', () => {
      expect(parseLine('foo{} 7')).toEqual({ kind: 'sample', name: 'foo', labels: {}, value: 7 })
    })

    it('should keep commas and braces inside quoted values', () => {
      expect(parseLine('requests{path="/a,b}",code="200"} 3')).toEqual({
        kind: 'sample',
        name: 'requests',
        labels: { path: '/a,b}', code: '200' },
        value: 3,
      })
    })

    it('should accept colons in metric names', () => {
      expect(parseLine('job:requests:rate5m 0.5')).toMatchObject({ name: 'job:requests:rate5m' })
    })

    it('should parse special values', () => {
      expect(parseLine('h_bucket{le="+Inf"} +Inf')).toMatchObject({ value: Infinity })
      expect(parseLine('g -Inf')).toMatchObject({ value: -Infinity })
      const nan = parseLine('g NaN')
      expect(nan.kind === 'sample' && Number.isNaN(nan.value)).toBe(true)
    })

    it('should tolerate surrounding whitespace', () => {
      expect(parseLine('  foo{a="1"}   4  ')).toEqual({
        kind: 'sample',
        name: 'foo',
        labels: { a: '1' },
        value: 4,
      })
    })
  })

  describe('headers', () => {
    it('should parse HELP headers', () => {
      expect(parseLine('# HELP seastar_test_group_counter_1 A counter for testing')).toEqual({
        kind: 'help',
        name: 'seastar_test_group_counter_1',
        text: 'A counter for testing',
      })
    })

    it('should parse HELP headers without text', () => {
      expect(parseLine('# HELP foo')).toEqual({ kind: 'help', name: 'foo', text: '' })
    })

    it('should unescape HELP text', () => {
      expect(parseLine('# HELP foo first\\nsecond \\\\ end')).toEqual({
        kind: 'help',
        name: 'foo',
        text: 'first\nsecond \\ end',
      })
    })

    it('should parse TYPE headers', () => {
      expect(parseLine('# TYPE foo histogram')).toEqual({
        kind: 'type',
        name: 'foo',
        type: 'histogram',
      })
    })

    it('should treat other comments as comments', () => {
      expect(parseLine('# scraped at noon')).toEqual({ kind: 'comment', text: 'scraped at noon' })
      expect(parseLine('# HELPER foo')).toEqual({ kind: 'comment', text: 'HELPER foo' })
    })

    it('should classify blank lines', () => {
      expect(parseLine('')).toEqual({ kind: 'blank' })
      expect(parseLine('   ')).toEqual({ kind: 'blank' })
    })
  })

  describe('malformed input', () => {
    const malformed = [
      'this is garbage',
      'foo{a="1"}',
      'foo{a="1"} 1 1700000000',
      'foo{a="1"} abc',
      'foo{a="1" 2',
      '# TYPE foo',
      '# TYPE foo gaugehistogram',
      'foo{a} 1',
    ]

    for (const line of malformed) {
      it(`should reject: ${line}`, () => {
        const error = captureError(() => parseLine(line))
        expect(error).toBeInstanceOf(ExpocheckError)
        expect(error).toMatchObject({ code: 'MALFORMED_LINE', category: 'parse' })
      })
    }

    it('should name the invalid value', () => {
      const error = captureError(() => parseLine('foo 1.2.3'))
      expect(error).toMatchObject({ message: "Malformed metric line (invalid value '1.2.3'): foo 1.2.3" })
    })
  })
})

describe('parseLabels', () => {
  it('should split pairs on the first equals sign', () => {
    expect(parseLabels('expr="a=b",shard="0"')).toEqual({ expr: 'a=b', shard: '0' })
  })

  it('should keep unquoted values as written', () => {
    expect(parseLabels('a=1, b = two')).toEqual({ a: '1', b: 'two' })
  })

  it('should unescape quoted values', () => {
    expect(parseLabels('msg="say \\"hi\\"",path="C:\\\\tmp"')).toEqual({
      msg: 'say "hi"',
      path: 'C:\\tmp',
    })
  })

  it('should allow a trailing comma', () => {
    expect(parseLabels('a="1",')).toEqual({ a: '1' })
  })
})

describe('parseSampleValue', () => {
  it('should parse numbers and special tokens', () => {
    expect(parseSampleValue('1.000000')).toBe(1)
    expect(parseSampleValue('-3e-2')).toBe(-0.03)
    expect(parseSampleValue('Inf')).toBe(Infinity)
    expect(parseSampleValue('nope')).toBeUndefined()
    expect(parseSampleValue('')).toBeUndefined()
  })
})
