// sweep-line.config.ts
import type { DecomposeMode } from "./lib/solvers/SweepLineDecomposerSolver/types"

const DEFAULT_MODE: DecomposeMode = "maximal"

/**
 * Configuration constants for the SweepLineDecomposerSolver.
 */
export const SWEEP_LINE_CONFIG = {
  /**
   * Mode used when `decompose` is called without one.
   *
   * "maximal": every output is as wide as possible, outputs may overlap
   * "disjoint": outputs tile the free area without overlapping
   */
  DEFAULT_MODE,

  /**
   * Steps allowed beyond one per event line before the solver gives up.
   */
  ITERATION_HEADROOM: 10,

  COLORS: {
    regionStroke: "#111827",
    obstructionFill: "#fee2e2",
    obstructionStroke: "#ef4444",
    finishedFill: "#d1fae5",
    finishedStroke: "#10b981",
    activeFill: "#dbeafe",
    activeStroke: "#3b82f6",
    sweepLine: "#9333ea",
  },
}
