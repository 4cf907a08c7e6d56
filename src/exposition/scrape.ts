/**
 * Metrics Scrape
 *
 * One response body from an exporter's metrics endpoint, queried by short
 * metric name. Names are qualified with the exporter's prefix and metric
 * group: `counter_1` → `seastar_test_group_counter_1`.
 */

import { parseLine } from './line-parser.js'
import { parseExposition } from './stream-parser.js'
import type { ExpositionRecord, Labels } from './types.js'

/** Prefix and metric group the exporter puts in front of every name */
export interface MetricNamespace {
  prefix: string
  group: string
}

const HELP_PREFIX = /^\s*#\s*HELP\s/

export const DEFAULT_NAMESPACE: Readonly<MetricNamespace> = Object.freeze({
  prefix: 'seastar',
  group: 'test_group',
})

/**
 * Name as the exporter's `__name__` filter expects it (group, no prefix)
 */
export function groupName(namespace: MetricNamespace, name: string): string {
  return `${namespace.group}_${name}`
}

/**
 * Fully-qualified name as it appears in exposition text
 */
export function qualifiedName(namespace: MetricNamespace, name: string): string {
  return `${namespace.prefix}_${groupName(namespace, name)}`
}

export class MetricsScrape {
  constructor(
    readonly lines: readonly string[],
    readonly namespace: MetricNamespace = DEFAULT_NAMESPACE
  ) {}

  /**
   * Split a response body into lines, ignoring trailing whitespace
   */
  static fromBody(body: string, namespace?: MetricNamespace): MetricsScrape {
    return new MetricsScrape(body.trimEnd().split('\n'), namespace)
  }

  qualifiedName(name: string): string {
    return qualifiedName(this.namespace, name)
  }

  groupName(name: string): string {
    return groupName(this.namespace, name)
  }

  /**
   * Records matching a short metric name and an exact label set.
   * Every call is a fresh parse pass over the stored lines.
   */
  records(name?: string, labels?: Labels): Generator<ExpositionRecord, void, undefined> {
    return parseExposition(this.lines, {
      name: name === undefined ? undefined : this.qualifiedName(name),
      labels,
    })
  }

  /**
   * HELP text for a short metric name.
   *
   * @returns the text of the first matching `# HELP` header, `''` for a
   *   header without text, undefined when the exporter sent none
   */
  help(name: string): string | undefined {
    const target = this.qualifiedName(name)
    for (const raw of this.lines) {
      if (!HELP_PREFIX.test(raw)) continue
      const line = parseLine(raw)
      if (line.kind === 'help' && line.name === target) {
        return line.text
      }
    }
    return undefined
  }
}
