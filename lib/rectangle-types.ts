// lib/rectangle-types.ts

/**
 * An axis-aligned rectangle with inclusive edges. "Top" is the numerically
 * larger y, so a well-formed rectangle has `left <= right` and
 * `bottom <= top`. Nothing enforces this; inverted sides give degenerate
 * geometry.
 */
export interface Rectangle<T> {
  left(): T
  right(): T
  top(): T
  bottom(): T
}

/** Builds rectangles of one concrete representation from their sides. */
export interface RectangleFactory<T, R extends Rectangle<T>> {
  fromSides(left: T, right: T, top: T, bottom: T): R
}

export type Sides<T> = { left: T; right: T; top: T; bottom: T }
