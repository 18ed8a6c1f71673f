import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle } from "../../rectangle-types"
import type { EventLine } from "./types"
import { lte } from "../../coordinates/compare"

/**
 * Collect every x where the free intervals can change, left to right.
 *
 * Gaps may close at the left of an obstruction and may open one unit past
 * its right. Events sharing an x are merged into one line carrying both
 * flags, and lines outside [region.left, region.right] are dropped.
 */
export function buildEventLines<T>(
  c: Coordinate<T>,
  region: Rectangle<T>,
  obstructions: readonly Rectangle<T>[],
): EventLine<T>[] {
  const raw: Array<{ x: T; opens: boolean }> = [
    { x: region.left(), opens: true },
  ]
  for (const o of obstructions) {
    raw.push({ x: o.left(), opens: false })
    raw.push({ x: c.add(o.right(), c.one), opens: true })
  }

  raw.sort((a, b) => c.compare(a.x, b.x))

  const lines: EventLine<T>[] = []
  for (const event of raw) {
    if (!lte(c, region.left(), event.x) || !lte(c, event.x, region.right())) {
      continue
    }
    const last = lines[lines.length - 1]
    if (last && c.compare(last.x, event.x) === 0) {
      if (event.opens) last.opens = true
      else last.closes = true
      continue
    }
    lines.push({ x: event.x, opens: event.opens, closes: !event.opens })
  }
  return lines
}
