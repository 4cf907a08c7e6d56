/**
 * Bucket Mapping
 *
 * Power-of-two binning with every octave [2^k, 2^(k+1)) split into four equal
 * sub-buckets. Both histogram sources (cumulative exposition counters and raw
 * sample values) go through the same function so their keys line up.
 */

import { Errors } from '../errors/index.js'

/** Sub-buckets per power-of-two octave */
export const SUB_BUCKETS_PER_OCTAVE = 4

/**
 * Largest power of two that is <= value.
 * Math.log2 can land one ulp off near exact powers, so the result is nudged
 * until `low <= value < 2 * low` holds.
 */
function octaveLow(value: number): number {
  let low = 2 ** Math.floor(Math.log2(value))
  while (low > value) low /= 2
  while (low * 2 <= value) low *= 2
  return low
}

/**
 * Map a positive value to the lower edge of its quarter-octave bucket.
 *
 * @example
 * ```typescript
 * bucketOf(3)   // 3   (octave [2, 4), step 0.5)
 * bucketOf(15)  // 14  (octave [8, 16), step 2)
 * ```
 * @throws ExpocheckError INVALID_BUCKET_VALUE for value <= 0, NaN or Infinity
 */
export function bucketOf(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw Errors.invalidBucketValue(value)
  }

  const low = octaveLow(value)
  const step = low / SUB_BUCKETS_PER_OCTAVE
  return low + step * Math.floor((value - low) / step)
}

/**
 * Build a histogram from raw sample values, one observation per value.
 */
export function valuesToHistogram(values: Iterable<number>): Map<number, number> {
  const histogram = new Map<number, number>()
  for (const value of values) {
    const bucket = bucketOf(value)
    histogram.set(bucket, (histogram.get(bucket) ?? 0) + 1)
  }
  return histogram
}
