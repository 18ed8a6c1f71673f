import type { Coordinate } from "../../types/coordinate-types"
import type { ActiveRect, DecomposeMode, Gap } from "./types"
import { sameShape, uncoveredIntervals } from "./shapes"

/**
 * Start active rectangles at `x` for gaps that no active rectangle tracks
 * yet. Returns the rectangles that were started.
 */
export function openActiveRects<T>(params: {
  coordinate: Coordinate<T>
  active: ActiveRect<T>[]
  gaps: readonly Gap<T>[]
  x: T
  mode: DecomposeMode
}): ActiveRect<T>[] {
  const { coordinate: c, active, gaps, x, mode } = params
  const started: ActiveRect<T>[] = []

  for (const gap of gaps) {
    if (mode === "maximal") {
      if (active.some((rect) => sameShape(c, rect, gap))) continue
      started.push({ left: x, top: gap.top, bottom: gap.bottom })
      continue
    }

    for (const interval of uncoveredIntervals(c, gap, active)) {
      started.push({ left: x, top: interval.top, bottom: interval.bottom })
    }
  }

  active.push(...started)
  return started
}
