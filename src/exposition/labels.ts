/**
 * Label helpers
 */

import type { Labels } from './types.js'

/**
 * Create a string key from labels, independent of key order
 */
export function labelsToKey(labels: Labels): string {
  const sortedKeys = Object.keys(labels).sort()
  if (sortedKeys.length === 0) return ''
  return sortedKeys.map((k) => `${k}="${labels[k]}"`).join(',')
}

/**
 * Exact label-set equality: same keys, byte-equal values
 */
export function labelsEqual(a: Labels, b: Labels): boolean {
  const keys = Object.keys(a)
  if (keys.length !== Object.keys(b).length) return false
  return keys.every((k) => Object.prototype.hasOwnProperty.call(b, k) && a[k] === b[k])
}

/**
 * Copy of labels without the given keys
 */
export function omitLabels(labels: Labels, ...keys: string[]): Labels {
  const result: Labels = {}
  for (const [k, v] of Object.entries(labels)) {
    if (!keys.includes(k)) result[k] = v
  }
  return result
}
