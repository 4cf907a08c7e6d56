/**
 * Exporter Check Suite
 *
 * Each check drives the exporter's query parameters and compares what comes
 * back with the metric definitions the exporter was started with.
 */

import { expectedRecords, recordFromDefinition } from '../config/definitions.js'
import { labelsEqual } from '../exposition/labels.js'
import { describeRecord, describeValue, sameRecords, valuesEqual } from '../exposition/record.js'
import { groupName, qualifiedName } from '../exposition/scrape.js'
import type { ExpositionRecord } from '../exposition/types.js'
import { createLogger } from '../utils/logger.js'
import type { Check, CheckContext, CheckOutcome, CheckResult, CheckSummary } from './types.js'

const logger = createLogger('checks')

/** Counter the exporter registers once per shard with values 1 and 2 */
export const AGGREGATED_COUNTER = 'counter_1'

function passed(): CheckOutcome {
  return { status: 'passed' }
}

function failed(problems: string[]): CheckOutcome {
  return { status: 'failed', message: problems.join('; ') }
}

function describeAll(records: readonly ExpositionRecord[]): string {
  return `[${records.map(describeRecord).join(', ')}]`
}

export const labelFilteringSansAggregation: Check = {
  name: 'label-filtering-sans-aggregation',
  async run(ctx) {
    const scrape = await ctx.endpoint.fetch({ labels: ctx.labelFilter })
    const actual = [...scrape.records()]
    const expected = expectedRecords(ctx.definitions, ctx.namespace, ctx.labelFilter)

    if (sameRecords(actual, expected)) {
      return passed()
    }
    return failed([`expected ${describeAll(expected)}, got ${describeAll(actual)}`])
  },
}

/** Regex sent for the `private` label and how many records it selects */
export const LABEL_FILTER_CASES: ReadonlyArray<{ regex: string; found: number }> = [
  { regex: 'dne', found: 0 },
  { regex: '404', found: 0 },
  { regex: '2', found: 1 },
  // the exporter sums the matching series
  { regex: '2|3', found: 1 },
]

export const labelFilteringWithAggregation: Check = {
  name: 'label-filtering-with-aggregation',
  async run(ctx) {
    const problems: string[] = []
    for (const { regex, found } of LABEL_FILTER_CASES) {
      const scrape = await ctx.endpoint.fetch({ labels: { private: regex } })
      const count = [...scrape.records()].length
      if (count !== found) {
        problems.push(`private=~'${regex}': expected ${found} records, got ${count}`)
      }
    }
    return problems.length === 0 ? passed() : failed(problems)
  },
}

export const aggregation: Check = {
  name: 'aggregation',
  async run(ctx) {
    const cases = [
      { aggregate: false, expected: [1, 2] },
      { aggregate: true, expected: [3] },
    ]
    const problems: string[] = []

    for (const { aggregate, expected } of cases) {
      const scrape = await ctx.endpoint.fetch({
        name: groupName(ctx.namespace, AGGREGATED_COUNTER),
        aggregate,
      })
      const values: number[] = []
      for (const record of scrape.records(AGGREGATED_COUNTER)) {
        if (record.kind === 'scalar') values.push(record.value)
      }
      values.sort((a, b) => a - b)

      if (values.join(',') !== expected.join(',')) {
        problems.push(`aggregate=${aggregate}: expected [${expected.join(', ')}], got [${values.join(', ')}]`)
      }
    }
    return problems.length === 0 ? passed() : failed(problems)
  },
}

export const help: Check = {
  name: 'help',
  async run(ctx) {
    const problems: string[] = []
    for (const withHelp of [true, false]) {
      const scrape = await ctx.endpoint.fetch({
        name: groupName(ctx.namespace, AGGREGATED_COUNTER),
        withHelp,
      })
      const present = scrape.help(AGGREGATED_COUNTER) !== undefined
      if (present !== withHelp) {
        problems.push(withHelp ? 'HELP missing when requested' : 'HELP present when disabled')
      }
    }
    return problems.length === 0 ? passed() : failed(problems)
  },
}

export const prometheusParity: Check = {
  name: 'prometheus-parity',
  async run(ctx) {
    const prometheus = ctx.prometheus
    if (!prometheus) {
      return { status: 'skipped', message: 'no Prometheus server configured' }
    }

    // Prometheus cannot be asked to scrape, so wait out one interval
    await ctx.sleep((ctx.scrapeIntervalSeconds + 1) * 1000)

    const problems: string[] = []
    for (const definition of ctx.definitions) {
      if (!labelsEqual(definition.labels, ctx.labelFilter)) continue

      const name = qualifiedName(ctx.namespace, definition.name)
      const expected = recordFromDefinition(name, definition)
      const actual = await prometheus.query(name, definition.type)
      if (!valuesEqual(expected, actual)) {
        problems.push(`${describeRecord(expected)}: Prometheus has ${describeValue(actual)}`)
      }
    }
    return problems.length === 0 ? passed() : failed(problems)
  },
}

export const DEFAULT_CHECKS: readonly Check[] = [
  labelFilteringSansAggregation,
  labelFilteringWithAggregation,
  aggregation,
  help,
  prometheusParity,
]

/**
 * Run checks one after another. A check that throws counts as failed.
 */
export async function runChecks(
  context: CheckContext,
  checks: readonly Check[] = DEFAULT_CHECKS
): Promise<CheckResult[]> {
  const results: CheckResult[] = []

  for (const check of checks) {
    const start = Date.now()
    let outcome: CheckOutcome
    try {
      outcome = await check.run(context)
    } catch (err) {
      outcome = { status: 'failed', message: err instanceof Error ? err.message : String(err) }
    }

    const result: CheckResult = { name: check.name, ...outcome, durationMs: Date.now() - start }
    results.push(result)

    if (result.status === 'failed') {
      logger.warn({ check: result.name, message: result.message }, 'Check failed')
    } else {
      logger.info({ check: result.name, status: result.status }, 'Check finished')
    }
  }

  return results
}

export function summarize(results: readonly CheckResult[]): CheckSummary {
  const summary: CheckSummary = { total: results.length, passed: 0, failed: 0, skipped: 0 }
  for (const result of results) {
    summary[result.status]++
  }
  return summary
}
