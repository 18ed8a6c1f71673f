import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle, RectangleFactory } from "../../rectangle-types"

/**
 * "maximal": every output runs as far right as its shape stays free; a tall
 * gap opening over narrower active shapes starts an overlapping rectangle.
 * "disjoint": only the uncovered parts of a gap start rectangles, so the
 * outputs tile the free area.
 */
export type DecomposeMode = "maximal" | "disjoint"

/** An x position where the set of free intervals may change. */
export type EventLine<T> = {
  x: T
  /** Some obstruction ends just before x, or the region starts at x. */
  opens: boolean
  /** Some obstruction starts at x. */
  closes: boolean
}

/** A free vertical interval [bottom, top] at one sweep position. */
export type Gap<T> = { top: T; bottom: T }

/** A rectangle being swept whose right edge is not known yet. */
export type ActiveRect<T> = { left: T; top: T; bottom: T }

export interface SweepLineDecomposerInput<T, R extends Rectangle<T>> {
  region: Rectangle<T>
  obstructions: readonly Rectangle<T>[]
  coordinate: Coordinate<T>
  factory: RectangleFactory<T, R>
  mode?: DecomposeMode
}
