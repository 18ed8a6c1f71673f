import type { Coordinate } from "./types/coordinate-types"
import type { Rectangle, RectangleFactory } from "./rectangle-types"
import type { DecomposeMode } from "./solvers/SweepLineDecomposerSolver/types"
import { SweepLineDecomposerSolver } from "./solvers/SweepLineDecomposerSolver/SweepLineDecomposerSolver"
import { numberCoordinate } from "./coordinates/numberCoordinate"
import {
  BasicRectangle,
  basicRectangleFactory,
} from "./rectangles/BasicRectangle"

export interface DecomposeOptions<T, R extends Rectangle<T>> {
  coordinate: Coordinate<T>
  factory: RectangleFactory<T, R>
  mode?: DecomposeMode
}

/**
 * Rectangles covering the part of `region` that no obstruction covers.
 * Returns an empty list when the region is fully covered.
 */
export function decompose<T, R extends Rectangle<T>>(
  region: Rectangle<T>,
  obstructions: readonly Rectangle<T>[],
  options: DecomposeOptions<T, R>,
): R[] {
  const solver = new SweepLineDecomposerSolver({
    region,
    obstructions,
    coordinate: options.coordinate,
    factory: options.factory,
    mode: options.mode,
  })
  solver.solve()
  return solver.getOutput().rects
}

/** `decompose` over numbers, producing BasicRectangles. */
export function unobstructedSubrectangles(
  region: Rectangle<number>,
  obstructions: readonly Rectangle<number>[],
  mode?: DecomposeMode,
): BasicRectangle[] {
  return decompose(region, obstructions, {
    coordinate: numberCoordinate,
    factory: basicRectangleFactory,
    mode,
  })
}
