import { expect, test } from "vitest"
import { getSvgFromGraphicsObject } from "graphics-debug"
import { SweepLineDecomposerSolver } from "../../lib/solvers/SweepLineDecomposerSolver/SweepLineDecomposerSolver"
import { numberCoordinate } from "../../lib/coordinates/numberCoordinate"
import {
  BasicRectangle,
  basicRectangleFactory,
} from "../../lib/rectangles/BasicRectangle"
import { sidesKey } from "../fixtures/latticeCells"
import { makeRng } from "../fixtures/makeRng"
import { makeRandomLayout } from "../fixtures/makeRandomLayout"
import type { DecomposeMode } from "../../lib/solvers/SweepLineDecomposerSolver/types"

const makeSolver = () =>
  new SweepLineDecomposerSolver({
    region: BasicRectangle.fromSides(0, 5, 5, 0),
    obstructions: [BasicRectangle.fromSides(0, 2, 5, 1)],
    coordinate: numberCoordinate,
    factory: basicRectangleFactory,
  })

const countLabel = (solver: ReturnType<typeof makeSolver>, label: string) =>
  (solver.visualize().rects ?? []).filter((r) => r.label === label).length

test("processes one event line per step", () => {
  const solver = makeSolver()

  solver.step()
  expect(solver.stats.totalLines).toBe(2)
  expect(solver.getCurrentGaps()).toEqual([{ top: 0, bottom: 0 }])
  expect(solver.stats.active).toBe(1)
  expect(solver.computeProgress()).toBeCloseTo(1 / 3)
  expect(countLabel(solver, "active")).toBe(1)
  expect(solver.visualize().lines).toHaveLength(1)

  solver.step()
  expect(solver.getCurrentGaps()).toEqual([{ top: 5, bottom: 0 }])
  expect(solver.stats.active).toBe(2)
  expect(solver.solved).toBe(false)

  solver.step()
  expect(solver.solved).toBe(true)
  expect(solver.computeProgress()).toBe(1)
  expect(solver.getOutput().rects.map(sidesKey)).toEqual([
    "0,5,0,0",
    "3,5,5,0",
  ])
  expect(countLabel(solver, "finished")).toBe(2)
  expect(countLabel(solver, "active")).toBe(0)
  expect(solver.visualize().lines).toHaveLength(0)
})

test("mode defaults to maximal and shows in the stats", () => {
  const solver = makeSolver()
  solver.solve()
  expect(solver.stats.mode).toBe("maximal")
})

test("visualization renders to svg", () => {
  const solver = makeSolver()
  solver.solve()
  const graphics = solver.visualize()
  expect(countLabel(solver, "region")).toBe(1)
  expect(countLabel(solver, "obstruction")).toBe(1)
  expect(graphics.title).toBe("Sweep Line Decomposer (maximal, line 2/2)")

  const svg = getSvgFromGraphicsObject(graphics, { backgroundColor: "white" })
  expect(svg).toContain("<svg")
})

test.each<DecomposeMode>(["maximal", "disjoint"])(
  "active rectangles never share a shape (%s)",
  (mode) => {
    const rng = makeRng(`active-shapes-${mode}`)
    for (let i = 0; i < 100; i++) {
      const { region, obstructions } = makeRandomLayout(rng)
      const solver = new SweepLineDecomposerSolver({
        region,
        obstructions,
        coordinate: numberCoordinate,
        factory: basicRectangleFactory,
        mode,
      })

      while (!solver.solved) {
        solver.step()
        const shapes = solver
          .getActiveRects()
          .map((rect) => `${rect.top},${rect.bottom}`)
        expect(new Set(shapes).size).toBe(shapes.length)
      }
    }
  },
)
