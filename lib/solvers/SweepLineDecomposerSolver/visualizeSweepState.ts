import type { GraphicsObject } from "graphics-debug"
import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle } from "../../rectangle-types"
import type { ActiveRect } from "./types"
import { SWEEP_LINE_CONFIG } from "../../../sweep-line.config"

const toGraphicsRect = <T>(
  c: Coordinate<T>,
  left: T,
  right: T,
  top: T,
  bottom: T,
) => {
  const l = c.toNumber(left)
  const r = c.toNumber(right)
  const t = c.toNumber(top)
  const b = c.toNumber(bottom)
  return {
    center: { x: (l + r) / 2, y: (t + b) / 2 },
    width: r - l,
    height: t - b,
  }
}

/**
 * Draw the region, the obstructions, finished and active rectangles, and
 * the current sweep line.
 */
export function visualizeSweepState<T>(params: {
  coordinate: Coordinate<T>
  region: Rectangle<T>
  obstructions: readonly Rectangle<T>[]
  finished: readonly Rectangle<T>[]
  active: readonly ActiveRect<T>[]
  sweepX: T | null
  title: string
}): GraphicsObject {
  const { coordinate: c, region, sweepX } = params
  const colors = SWEEP_LINE_CONFIG.COLORS
  const rects: NonNullable<GraphicsObject["rects"]> = []
  const lines: NonNullable<GraphicsObject["lines"]> = []

  rects.push({
    ...toGraphicsRect(
      c,
      region.left(),
      region.right(),
      region.top(),
      region.bottom(),
    ),
    fill: "none",
    stroke: colors.regionStroke,
    label: "region",
  })

  for (const o of params.obstructions) {
    rects.push({
      ...toGraphicsRect(c, o.left(), o.right(), o.top(), o.bottom()),
      fill: colors.obstructionFill,
      stroke: colors.obstructionStroke,
      layer: "obstruction",
      label: "obstruction",
    })
  }

  for (const r of params.finished) {
    rects.push({
      ...toGraphicsRect(c, r.left(), r.right(), r.top(), r.bottom()),
      fill: colors.finishedFill,
      stroke: colors.finishedStroke,
      layer: "finished",
      label: "finished",
    })
  }

  // Active rects are drawn up to the sweep line
  if (sweepX !== null) {
    for (const a of params.active) {
      rects.push({
        ...toGraphicsRect(c, a.left, sweepX, a.top, a.bottom),
        fill: colors.activeFill,
        stroke: colors.activeStroke,
        layer: "active",
        label: "active",
      })
    }

    const x = c.toNumber(sweepX)
    lines.push({
      points: [
        { x, y: c.toNumber(region.bottom()) },
        { x, y: c.toNumber(region.top()) },
      ],
      strokeColor: colors.sweepLine,
      label: "sweep",
    })
  }

  return {
    title: params.title,
    coordinateSystem: "cartesian",
    rects,
    lines,
    points: [],
  }
}
