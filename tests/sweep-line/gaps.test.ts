import { expect, test } from "vitest"
import { numberCoordinate } from "../../lib/coordinates/numberCoordinate"
import { BasicRectangle } from "../../lib/rectangles/BasicRectangle"
import { computeGapsAtLine } from "../../lib/solvers/SweepLineDecomposerSolver/computeGapsAtLine"
import {
  intersectShapeWithGap,
  uncoveredIntervals,
} from "../../lib/solvers/SweepLineDecomposerSolver/shapes"

const region = BasicRectangle.fromSides(0, 10, 10, 0)

test("no covering obstructions leaves the whole column free", () => {
  expect(computeGapsAtLine(numberCoordinate, region, [])).toEqual([
    { top: 10, bottom: 0 },
  ])
})

test("gaps between overlapping shingles", () => {
  const gaps = computeGapsAtLine(numberCoordinate, region, [
    BasicRectangle.fromSides(0, 1, 9, 8),
    BasicRectangle.fromSides(0, 1, 6, 4),
    BasicRectangle.fromSides(0, 1, 5, 2),
  ])
  expect(gaps).toEqual([
    { top: 10, bottom: 10 },
    { top: 7, bottom: 7 },
    { top: 1, bottom: 0 },
  ])
})

test("an obstruction covering the column leaves no gap", () => {
  expect(
    computeGapsAtLine(numberCoordinate, region, [
      BasicRectangle.fromSides(0, 1, 12, -2),
    ]),
  ).toEqual([])
})

test("intersecting a shape with a disjoint gap gives null", () => {
  expect(
    intersectShapeWithGap(
      numberCoordinate,
      { left: 0, top: 5, bottom: 3 },
      { top: 1, bottom: 0 },
    ),
  ).toBeNull()
  expect(
    intersectShapeWithGap(
      numberCoordinate,
      { left: 0, top: 5, bottom: 0 },
      { top: 8, bottom: 2 },
    ),
  ).toEqual({ top: 5, bottom: 2 })
})

test("uncovered parts of a gap", () => {
  expect(
    uncoveredIntervals(numberCoordinate, { top: 10, bottom: 0 }, [
      { left: 3, top: 3, bottom: 0 },
      { left: 3, top: 10, bottom: 7 },
    ]),
  ).toEqual([{ top: 6, bottom: 4 }])

  expect(
    uncoveredIntervals(numberCoordinate, { top: 4, bottom: 0 }, [
      { left: 0, top: 9, bottom: 6 },
    ]),
  ).toEqual([{ top: 4, bottom: 0 }])
})
