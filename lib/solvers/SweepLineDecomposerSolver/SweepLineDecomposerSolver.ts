import type { GraphicsObject } from "graphics-debug"
import { BaseSolver } from "@tscircuit/solver-utils"
import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle, RectangleFactory } from "../../rectangle-types"
import type { FlatbushIndex } from "../../data-structures/FlatbushIndex"
import type {
  ActiveRect,
  DecomposeMode,
  EventLine,
  Gap,
  SweepLineDecomposerInput,
} from "./types"
import { sortObstructions } from "./sortObstructions"
import { buildEventLines } from "./buildEventLines"
import { buildObstructionIndex } from "./buildObstructionIndex"
import { computeGapsAtLine } from "./computeGapsAtLine"
import { openActiveRects } from "./openActiveRects"
import { closeActiveRects } from "./closeActiveRects"
import { visualizeSweepState } from "./visualizeSweepState"
import { SWEEP_LINE_CONFIG } from "../../../sweep-line.config"

/**
 * Decomposes the part of a region not covered by obstructions into
 * axis-aligned rectangles with a left-to-right sweep.
 *
 * Each step handles exactly one event line: it computes the free vertical
 * intervals ("gaps") at that x, finishes active rectangles that no longer
 * fit a gap and starts rectangles for gaps nobody tracks yet. Once every
 * line is handled, the rectangles still active run to the region's right
 * edge.
 */
export class SweepLineDecomposerSolver<
  T,
  R extends Rectangle<T>,
> extends BaseSolver {
  private coordinate: Coordinate<T>
  private factory: RectangleFactory<T, R>
  private region: Rectangle<T>
  private mode: DecomposeMode

  private obstructions: Rectangle<T>[] = []
  private lines: EventLine<T>[] = []
  private obstructionIndex: FlatbushIndex<Rectangle<T>> | null = null
  private lineIndex = 0
  private isSetup = false
  private currentGaps: Gap<T>[] = []

  private active: ActiveRect<T>[] = []
  private finished: R[] = []

  constructor(private input: SweepLineDecomposerInput<T, R>) {
    super()
    this.coordinate = input.coordinate
    this.factory = input.factory
    this.region = input.region
    this.mode = input.mode ?? SWEEP_LINE_CONFIG.DEFAULT_MODE
  }

  override _setup() {
    const c = this.coordinate
    this.obstructions = sortObstructions(
      c,
      this.region,
      this.input.obstructions,
    )
    this.lines = buildEventLines(c, this.region, this.obstructions)
    this.obstructionIndex = buildObstructionIndex(
      c,
      this.lines,
      this.obstructions,
    )
    this.lineIndex = 0
    this.active = []
    this.finished = []
    this.MAX_ITERATIONS =
      this.lines.length + SWEEP_LINE_CONFIG.ITERATION_HEADROOM

    this.stats = {
      mode: this.mode,
      lineIndex: 0,
      totalLines: this.lines.length,
      obstructions: this.obstructions.length,
    }
    this.isSetup = true
  }

  /** Exactly ONE event line per call. */
  override _step() {
    if (!this.isSetup) this._setup()

    const line = this.lines[this.lineIndex]
    if (!line) {
      this.finishRemaining()
      this.solved = true
      return
    }

    const c = this.coordinate
    const covering =
      this.obstructionIndex?.search(this.lineIndex, 0, this.lineIndex, 0) ?? []
    const gaps = computeGapsAtLine(c, this.region, covering)

    if (line.closes) {
      const { active, finished } = closeActiveRects({
        coordinate: c,
        factory: this.factory,
        active: this.active,
        gaps,
        x: line.x,
      })
      this.active = active
      this.finished.push(...finished)
    }

    if (line.opens) {
      openActiveRects({
        coordinate: c,
        active: this.active,
        gaps,
        x: line.x,
        mode: this.mode,
      })
    }

    this.currentGaps = gaps
    this.lineIndex++

    this.stats.lineIndex = this.lineIndex
    this.stats.gaps = gaps.length
    this.stats.active = this.active.length
    this.stats.finished = this.finished.length
  }

  private finishRemaining() {
    const right = this.region.right()
    for (const rect of this.active) {
      this.finished.push(
        this.factory.fromSides(rect.left, right, rect.top, rect.bottom),
      )
    }
    this.active = []
    this.stats.active = 0
    this.stats.finished = this.finished.length
  }

  computeProgress(): number {
    if (this.solved) return 1
    // The last step closes the remaining rectangles
    return this.lineIndex / (this.lines.length + 1)
  }

  /** Rectangles currently being swept, right edge still open. */
  getActiveRects(): readonly ActiveRect<T>[] {
    return this.active
  }

  /** Gaps found at the most recently processed event line. */
  getCurrentGaps(): readonly Gap<T>[] {
    return this.currentGaps
  }

  override getOutput(): { rects: R[] } {
    return { rects: this.finished }
  }

  override visualize(): GraphicsObject {
    const lastLine = this.lines[this.lineIndex - 1]
    return visualizeSweepState({
      coordinate: this.coordinate,
      region: this.region,
      obstructions: this.input.obstructions,
      finished: this.finished,
      active: this.active,
      sweepX: this.solved || !lastLine ? null : lastLine.x,
      title: `Sweep Line Decomposer (${this.mode}, line ${this.lineIndex}/${this.lines.length})`,
    })
  }
}
