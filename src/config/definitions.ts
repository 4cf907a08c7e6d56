/**
 * Metric Definitions
 *
 * The exporter under test is driven by a YAML file that declares which
 * metrics it registers and which values it reports. The same file gives the
 * expected records, computed without asking the exporter.
 *
 * ```yaml
 * metrics:
 *   - name: counter_1
 *     type: counter
 *     values: [1]
 *     labels:
 *       private: "1"
 * ```
 */

import { readFile } from 'node:fs/promises'
import { load, JSON_SCHEMA, YAMLException } from 'js-yaml'
import { z } from 'zod'
import { Errors } from '../errors/index.js'
import { valuesToHistogram } from '../exposition/buckets.js'
import { labelsEqual } from '../exposition/labels.js'
import { histogramRecord, scalarRecord } from '../exposition/record.js'
import { qualifiedName, type MetricNamespace } from '../exposition/scrape.js'
import type { ExpositionRecord, Labels } from '../exposition/types.js'

const numericValue = z.union([
  z.number(),
  z
    .string()
    .trim()
    .min(1)
    .transform((value, ctx) => {
      const parsed = Number(value)
      if (Number.isNaN(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a number` })
        return z.NEVER
      }
      return parsed
    }),
])

const labelValue = z.union([z.string(), z.number(), z.boolean()]).transform(String)

export const metricDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['counter', 'gauge', 'histogram', 'summary']),
  values: z.array(numericValue).min(1),
  labels: z.record(labelValue).default({}),
})

export const definitionsFileSchema = z.object({
  metrics: z.array(metricDefinitionSchema),
})

export type MetricDefinition = z.infer<typeof metricDefinitionSchema>

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map(String).join('.') || 'root'
}

/**
 * Parse a definitions document
 *
 * @throws ExpocheckError INVALID_DEFINITION on YAML syntax errors and schema
 *   violations
 */
export function parseDefinitions(content: string): MetricDefinition[] {
  let document: unknown
  try {
    document = load(content, { schema: JSON_SCHEMA, json: true })
  } catch (err) {
    if (err instanceof YAMLException) {
      const { mark } = err
      if (mark) {
        throw Errors.invalidDefinition(
          `Invalid YAML at line ${mark.line + 1}, column ${mark.column + 1}: ${err.reason || err.message}`,
          { line: mark.line + 1, column: mark.column + 1 }
        )
      }
      throw Errors.invalidDefinition(`Invalid YAML: ${err.message}`)
    }
    throw err
  }

  const result = definitionsFileSchema.safeParse(document)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: formatPath(issue.path),
      reason: issue.message,
    }))
    throw Errors.invalidDefinition(
      issues.map((i) => `${i.field}: ${i.reason}`).join('; '),
      { issues }
    )
  }

  return result.data.metrics
}

/**
 * Read and parse a definitions file
 */
export async function loadDefinitions(path: string): Promise<MetricDefinition[]> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    throw Errors.invalidDefinition(
      `Cannot read definitions file '${path}': ${err instanceof Error ? err.message : String(err)}`,
      { path }
    )
  }
  return parseDefinitions(content)
}

/**
 * Record the exporter should expose for a definition.
 *
 * Gauges and counters carry their single value and the configured labels.
 * Histograms are rebuilt from the raw values with the same bucket mapping the
 * parser uses, and carry no labels.
 *
 * @throws ExpocheckError INVALID_DEFINITION for a scalar with several values,
 *   UNSUPPORTED_TYPE for summaries
 */
export function recordFromDefinition(name: string, definition: MetricDefinition): ExpositionRecord {
  switch (definition.type) {
    case 'counter':
    case 'gauge': {
      if (definition.values.length !== 1) {
        throw Errors.invalidDefinition(
          `${definition.type} '${definition.name}' must have exactly one value, got ${definition.values.length}`
        )
      }
      return scalarRecord(name, definition.values[0], definition.labels)
    }
    case 'histogram':
      return histogramRecord(name, valuesToHistogram(definition.values))
    case 'summary':
      throw Errors.unsupportedType('summary')
  }
}

/**
 * Expected records for the definitions whose labels equal `labels` exactly
 */
export function expectedRecords(
  definitions: readonly MetricDefinition[],
  namespace: MetricNamespace,
  labels: Labels
): ExpositionRecord[] {
  return definitions
    .filter((definition) => labelsEqual(definition.labels, labels))
    .map((definition) =>
      recordFromDefinition(qualifiedName(namespace, definition.name), definition)
    )
}
