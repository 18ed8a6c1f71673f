/**
 * Capability set of an ordered numeric coordinate type.
 *
 * Implementations are expected to describe a totally ordered ring-like type
 * (integers, bigints, fixed point...). Overflow is the caller's problem.
 */
export interface Coordinate<T> {
  readonly zero: T
  /** Smallest step between two adjacent lattice positions. */
  readonly one: T
  add(a: T, b: T): T
  sub(a: T, b: T): T
  mul(a: T, b: T): T
  /** Negative when a < b, zero when equal, positive when a > b. */
  compare(a: T, b: T): number
  min(a: T, b: T): T
  max(a: T, b: T): T
  /** Lossy projection used for visualization only. */
  toNumber(a: T): number
}

export type CoordinateBase<T> = Omit<Coordinate<T>, "min" | "max">
