// lib/geometry/rect-geometry.ts
import type { Coordinate } from "../types/coordinate-types"
import type { Rectangle, RectangleFactory, Sides } from "../rectangle-types"
import { eq, gte, lte } from "../coordinates/compare"

export function rectWidth<T>(c: Coordinate<T>, r: Rectangle<T>): T {
  return c.sub(r.right(), r.left())
}

export function rectHeight<T>(c: Coordinate<T>, r: Rectangle<T>): T {
  return c.sub(r.top(), r.bottom())
}

export function rectPerimeter<T>(c: Coordinate<T>, r: Rectangle<T>): T {
  const halfPerimeter = c.add(rectWidth(c, r), rectHeight(c, r))
  return c.mul(halfPerimeter, c.add(c.one, c.one))
}

export function rectArea<T>(c: Coordinate<T>, r: Rectangle<T>): T {
  return c.mul(rectWidth(c, r), rectHeight(c, r))
}

export function rectSides<T>(r: Rectangle<T>): Sides<T> {
  return { left: r.left(), right: r.right(), top: r.top(), bottom: r.bottom() }
}

/** Shift every side of a rectangle by (dx, dy). */
export function translateRect<T, R extends Rectangle<T>>(
  c: Coordinate<T>,
  factory: RectangleFactory<T, R>,
  r: Rectangle<T>,
  dx: T,
  dy: T,
): R {
  return factory.fromSides(
    c.add(r.left(), dx),
    c.add(r.right(), dx),
    c.add(r.top(), dy),
    c.add(r.bottom(), dy),
  )
}

export function containsPoint<T>(
  c: Coordinate<T>,
  r: Rectangle<T>,
  x: T,
  y: T,
): boolean {
  return (
    lte(c, r.left(), x) &&
    lte(c, x, r.right()) &&
    lte(c, r.bottom(), y) &&
    lte(c, y, r.top())
  )
}

/** True when `inner` lies entirely within `outer` (shared edges count). */
export function containsRect<T>(
  c: Coordinate<T>,
  outer: Rectangle<T>,
  inner: Rectangle<T>,
): boolean {
  return (
    lte(c, outer.left(), inner.left()) &&
    gte(c, outer.right(), inner.right()) &&
    gte(c, outer.top(), inner.top()) &&
    lte(c, outer.bottom(), inner.bottom())
  )
}

/** Closed-interval overlap on both axes, so touching edges overlap. */
export function rectsOverlap<T>(
  c: Coordinate<T>,
  a: Rectangle<T>,
  b: Rectangle<T>,
): boolean {
  return (
    lte(c, a.left(), b.right()) &&
    gte(c, a.right(), b.left()) &&
    gte(c, a.top(), b.bottom()) &&
    lte(c, a.bottom(), b.top())
  )
}

/**
 * The rectangle shared by `a` and `b`, or null when they don't overlap.
 */
export function rectIntersection<T, R extends Rectangle<T>>(
  c: Coordinate<T>,
  factory: RectangleFactory<T, R>,
  a: Rectangle<T>,
  b: Rectangle<T>,
): R | null {
  const left = c.max(a.left(), b.left())
  const right = c.min(a.right(), b.right())
  const top = c.min(a.top(), b.top())
  const bottom = c.max(a.bottom(), b.bottom())
  if (!lte(c, left, right) || !lte(c, bottom, top)) return null
  return factory.fromSides(left, right, top, bottom)
}

export function rectsEqual<T>(
  c: Coordinate<T>,
  a: Rectangle<T>,
  b: Rectangle<T>,
): boolean {
  return (
    eq(c, a.left(), b.left()) &&
    eq(c, a.right(), b.right()) &&
    eq(c, a.top(), b.top()) &&
    eq(c, a.bottom(), b.bottom())
  )
}
