import type { ErrorFrequency } from '../types.js'

/**
 * Compares two strings by Unicode code point, which is also UTF-8 byte order.
 * Differs from `<` when a surrogate pair meets a BMP character above U+D7FF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0
  let j = 0
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0
    const cb = b.codePointAt(j) ?? 0
    if (ca !== cb) return ca - cb
    i += ca > 0xffff ? 2 : 1
    j += cb > 0xffff ? 2 : 1
  }
  return (a.length - i) - (b.length - j)
}

/**
 * Orders by count descending, then message ascending by code point.
 * Total over distinct messages, so the result never depends on map order.
 */
export function compareErrorFrequency(a: ErrorFrequency, b: ErrorFrequency): number {
  if (a.count !== b.count) return b.count - a.count
  return compareCodePoints(a.message, b.message)
}

/**
 * Returns the `n` most frequent error messages.
 * Fewer than `n` distinct messages → all of them, no padding.
 *
 * @throws {RangeError} if `n` is negative or not an integer.
 */
export function selectTopErrors(
  frequencies: ReadonlyMap<string, number>,
  n: number,
): readonly ErrorFrequency[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`top-N must be a non-negative integer, got ${n}`)
  }
  if (n === 0) return Object.freeze([])

  const ranked = Array.from(frequencies, ([message, count]) => ({ message, count }))
    .sort(compareErrorFrequency)
    .slice(0, n)
    .map((entry) => Object.freeze(entry))
  return Object.freeze(ranked)
}
