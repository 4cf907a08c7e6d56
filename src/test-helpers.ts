/**
 * Shared test helpers
 */

/**
 * Run a function that is expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('Expected function to throw')
}

/**
 * Build exposition lines from a template literal, dropping indentation
 */
export function lines(text: string): string[] {
  return text
    .trim()
    .split('\n')
    .map((line) => line.trim())
}
