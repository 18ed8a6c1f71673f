import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle } from "../../rectangle-types"
import type { EventLine } from "./types"
import { FlatbushIndex } from "../../data-structures/FlatbushIndex"
import { lowerBound, upperBound } from "../../utils/binarySearch"

/**
 * Index obstructions by the range of event lines they span.
 *
 * Coordinates are only ordered, not necessarily numbers, so each
 * obstruction is stored as the interval of event indices i with
 * left <= lines[i].x <= right. Searching index i then returns the
 * obstructions covering that line, in their original order.
 */
export function buildObstructionIndex<T>(
  c: Coordinate<T>,
  lines: readonly EventLine<T>[],
  obstructions: readonly Rectangle<T>[],
): FlatbushIndex<Rectangle<T>> {
  const xs = lines.map((line) => line.x)
  const spans: Array<{ obstruction: Rectangle<T>; from: number; to: number }> =
    []

  for (const obstruction of obstructions) {
    const from = lowerBound(c, xs, obstruction.left())
    const to = upperBound(c, xs, obstruction.right()) - 1
    if (from > to) continue
    spans.push({ obstruction, from, to })
  }

  const index = new FlatbushIndex<Rectangle<T>>(spans.length)
  for (const { obstruction, from, to } of spans) {
    index.insert(obstruction, from, 0, to, 0)
  }
  index.finish()
  return index
}
