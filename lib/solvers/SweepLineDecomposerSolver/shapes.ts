import type { Coordinate } from "../../types/coordinate-types"
import type { ActiveRect, Gap } from "./types"
import { eq, gt, gte, lte } from "../../coordinates/compare"

type Shape<T> = Gap<T> | ActiveRect<T>

export function sameShape<T>(c: Coordinate<T>, a: Shape<T>, b: Shape<T>) {
  return eq(c, a.top, b.top) && eq(c, a.bottom, b.bottom)
}

export function shapeFitsInGap<T>(
  c: Coordinate<T>,
  shape: Shape<T>,
  gap: Gap<T>,
) {
  return gte(c, gap.top, shape.top) && gte(c, shape.bottom, gap.bottom)
}

/** The vertical interval shared by a shape and a gap, or null. */
export function intersectShapeWithGap<T>(
  c: Coordinate<T>,
  shape: Shape<T>,
  gap: Gap<T>,
): Gap<T> | null {
  const top = c.min(shape.top, gap.top)
  const bottom = c.max(shape.bottom, gap.bottom)
  return lte(c, bottom, top) ? { top, bottom } : null
}

/**
 * Parts of `gap` not covered by any of `shapes`, top to bottom. Shapes are
 * expected to be pairwise disjoint.
 */
export function uncoveredIntervals<T>(
  c: Coordinate<T>,
  gap: Gap<T>,
  shapes: readonly Shape<T>[],
): Gap<T>[] {
  const inside = shapes
    .map((shape) => intersectShapeWithGap(c, shape, gap))
    .filter((shape): shape is Gap<T> => shape !== null)
    .sort((a, b) => c.compare(b.top, a.top))

  const intervals: Gap<T>[] = []
  let cursor = gap.top
  for (const shape of inside) {
    if (gt(c, cursor, shape.top)) {
      intervals.push({ top: cursor, bottom: c.add(shape.top, c.one) })
    }
    cursor = c.min(cursor, c.sub(shape.bottom, c.one))
  }
  if (gte(c, cursor, gap.bottom)) {
    intervals.push({ top: cursor, bottom: gap.bottom })
  }
  return intervals
}
