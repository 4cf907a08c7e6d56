/**
 * Exposition Line Parser
 *
 * Classifies a single line of Prometheus text exposition. Stateless; the
 * stream parser supplies the context between lines.
 *
 * Format:
 * # HELP metric_name Description
 * # TYPE metric_name type
 * metric_name{label="value"} 123
 */

import { Errors } from '../errors/index.js'
import { METRIC_TYPES, type ExpositionLine, type Labels, type MetricType } from './types.js'

// name, optional label block (quoted values may contain `}` and `,`), value.
// No timestamp: the exporter never writes one.
const SAMPLE_PATTERN =
  /^([A-Za-z_:][\w:]*)(?:\{((?:[^"}]|"(?:[^"\\]|\\.)*")*)\})?\s+(\S+)$/

const HEADER_PATTERN = /^#\s*(HELP|TYPE)(?:\s+(\S+))?(?:\s+(.*))?$/

function isMetricType(value: string): value is MetricType {
  return METRIC_TYPES.some((type) => type === value)
}

/**
 * Undo `\\`, `\"` and `\n` escapes
 */
function unescape(value: string): string {
  return value.replace(/\\(.)/g, (_, ch: string) => (ch === 'n' ? '\n' : ch))
}

/**
 * Split a label block on commas that are not inside double quotes
 */
function splitPairs(block: string): string[] {
  const pairs: string[] = []
  let current = ''
  let quoted = false

  for (let i = 0; i < block.length; i++) {
    const ch = block[i]
    if (quoted && ch === '\\') {
      current += ch + (block[i + 1] ?? '')
      i++
      continue
    }
    if (ch === '"') quoted = !quoted
    if (ch === ',' && !quoted) {
      pairs.push(current)
      current = ''
      continue
    }
    current += ch
  }
  pairs.push(current)

  return pairs.map((p) => p.trim()).filter((p) => p.length > 0)
}

/**
 * Parse the inside of a `{...}` label block.
 *
 * Each pair is split on its first `=`. Double-quoted values are unquoted and
 * unescaped, unquoted values are kept as written.
 *
 * @example
 * ```typescript
 * parseLabels('shard="0",private="1"')  // { shard: '0', private: '1' }
 * ```
 */
export function parseLabels(block: string): Labels {
  const labels: Labels = {}

  for (const pair of splitPairs(block)) {
    const eq = pair.indexOf('=')
    if (eq === -1) {
      throw Errors.malformedLine(`{${block}}`, `label without value: ${pair}`)
    }
    const key = pair.slice(0, eq).trim()
    const raw = pair.slice(eq + 1).trim()
    labels[key] =
      raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')
        ? unescape(raw.slice(1, -1))
        : raw
  }

  return labels
}

/**
 * Parse a sample value token: floats, exponent form, NaN and ±Inf
 */
export function parseSampleValue(token: string): number | undefined {
  switch (token) {
    case '+Inf':
    case 'Inf':
      return Infinity
    case '-Inf':
      return -Infinity
    case 'NaN':
      return NaN
  }
  const value = Number(token)
  return token.length > 0 && !Number.isNaN(value) ? value : undefined
}

function parseHeader(line: string): ExpositionLine {
  const match = HEADER_PATTERN.exec(line)
  if (!match) {
    return { kind: 'comment', text: line.slice(1).trim() }
  }

  const [, keyword, name, rest] = match
  if (!name) {
    throw Errors.malformedLine(line, `${keyword} without metric name`)
  }

  if (keyword === 'HELP') {
    return { kind: 'help', name, text: unescape((rest ?? '').trim()) }
  }

  const type = (rest ?? '').trim()
  if (!isMetricType(type)) {
    throw Errors.malformedLine(line, type ? `unknown type '${type}'` : 'missing type')
  }
  return { kind: 'type', name, type }
}

/**
 * Classify one exposition line.
 *
 * @throws ExpocheckError MALFORMED_LINE when a non-comment line does not
 *   match the sample grammar, or a TYPE header is incomplete
 */
export function parseLine(line: string): ExpositionLine {
  const trimmed = line.trim()
  if (!trimmed) {
    return { kind: 'blank' }
  }

  if (trimmed.startsWith('#')) {
    return parseHeader(trimmed)
  }

  const match = SAMPLE_PATTERN.exec(trimmed)
  if (!match) {
    throw Errors.malformedLine(line)
  }

  const [, name, labelBlock, valueToken] = match
  const value = parseSampleValue(valueToken)
  if (value === undefined) {
    throw Errors.malformedLine(line, `invalid value '${valueToken}'`)
  }

  return {
    kind: 'sample',
    name,
    labels: labelBlock ? parseLabels(labelBlock) : {},
    value,
  }
}
