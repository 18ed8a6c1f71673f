import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle } from "../../rectangle-types"
import type { Gap } from "./types"
import { gt, gte } from "../../coordinates/compare"

/**
 * Free vertical intervals of the region at one sweep position, top to
 * bottom.
 *
 * `covering` must be the obstructions spanning this x, sorted by
 * descending top. Think of them as shingles on a roof: if the lowest
 * bottom seen so far is above the next shingle's top, the space between
 * them is free.
 */
export function computeGapsAtLine<T>(
  c: Coordinate<T>,
  region: Rectangle<T>,
  covering: readonly Rectangle<T>[],
): Gap<T>[] {
  const gaps: Gap<T>[] = []
  let cursor = region.top()

  for (const obstruction of covering) {
    if (gt(c, cursor, obstruction.top())) {
      // Tops are inclusive
      gaps.push({ top: cursor, bottom: c.add(obstruction.top(), c.one) })
    }
    // A later shingle starting higher up must not produce a fake gap
    cursor = c.min(cursor, c.sub(obstruction.bottom(), c.one))
  }

  if (gte(c, cursor, region.bottom())) {
    gaps.push({ top: cursor, bottom: region.bottom() })
  }

  return gaps
}
