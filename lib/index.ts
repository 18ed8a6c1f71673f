export type { Coordinate, CoordinateBase } from "./types/coordinate-types"
export type { Rectangle, RectangleFactory, Sides } from "./rectangle-types"
export type {
  DecomposeMode,
  SweepLineDecomposerInput,
} from "./solvers/SweepLineDecomposerSolver/types"
export type { DecomposeOptions } from "./decompose"
export type { RectGeometry } from "./geometry/createRectGeometry"

export { defineCoordinate } from "./coordinates/defineCoordinate"
export { numberCoordinate } from "./coordinates/numberCoordinate"
export { bigintCoordinate } from "./coordinates/bigintCoordinate"
export { lt, lte, gt, gte, eq } from "./coordinates/compare"
export * from "./geometry/rect-geometry"
export { createRectGeometry } from "./geometry/createRectGeometry"
export {
  BasicRectangle,
  basicRectangleFactory,
} from "./rectangles/BasicRectangle"
export {
  SideRectangle,
  sideRectangleFactory,
} from "./rectangles/SideRectangle"
export { SweepLineDecomposerSolver } from "./solvers/SweepLineDecomposerSolver/SweepLineDecomposerSolver"
export { decompose, unobstructedSubrectangles } from "./decompose"
