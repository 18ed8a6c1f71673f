import type { Coordinate } from "../types/coordinate-types"

/** Index of the first element of sorted `xs` that is >= value. */
export function lowerBound<T>(c: Coordinate<T>, xs: readonly T[], value: T) {
  let lo = 0
  let hi = xs.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if (c.compare(xs[mid]!, value) < 0) lo = mid + 1
    else hi = mid
  }
  return lo
}

/** Index of the first element of sorted `xs` that is > value. */
export function upperBound<T>(c: Coordinate<T>, xs: readonly T[], value: T) {
  let lo = 0
  let hi = xs.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if (c.compare(xs[mid]!, value) <= 0) lo = mid + 1
    else hi = mid
  }
  return lo
}
