import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle, RectangleFactory } from "../../rectangle-types"
import type { ActiveRect, Gap } from "./types"
import { intersectShapeWithGap, sameShape, shapeFitsInGap } from "./shapes"

/**
 * Finish every active rectangle whose shape no longer fits a gap at `x`.
 *
 * A finished rectangle ends one unit before `x`. Whatever part of its shape
 * is still free continues as a new active rectangle starting at `x`, unless
 * a rectangle with the same shape is already active.
 */
export function closeActiveRects<T, R extends Rectangle<T>>(params: {
  coordinate: Coordinate<T>
  factory: RectangleFactory<T, R>
  active: readonly ActiveRect<T>[]
  gaps: readonly Gap<T>[]
  x: T
}): { active: ActiveRect<T>[]; finished: R[] } {
  const { coordinate: c, factory, active, gaps, x } = params

  const next: ActiveRect<T>[] = []
  const closed: ActiveRect<T>[] = []
  for (const rect of active) {
    if (gaps.some((gap) => shapeFitsInGap(c, rect, gap))) next.push(rect)
    else closed.push(rect)
  }

  const right = c.sub(x, c.one)
  const finished = closed.map((rect) =>
    factory.fromSides(rect.left, right, rect.top, rect.bottom),
  )

  for (const rect of closed) {
    for (const gap of gaps) {
      const shape = intersectShapeWithGap(c, rect, gap)
      if (!shape) continue
      if (next.some((other) => sameShape(c, other, shape))) continue
      next.push({ left: x, top: shape.top, bottom: shape.bottom })
    }
  }

  return { active: next, finished }
}
