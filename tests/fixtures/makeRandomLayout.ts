import { BasicRectangle } from "../../lib/rectangles/BasicRectangle"
import type { RNG } from "./makeRng"

/**
 * A small region plus obstructions that may overlap each other and stick
 * out of the region on any side.
 */
export function makeRandomLayout(rng: RNG) {
  const left = rng.int(-3, 3)
  const bottom = rng.int(-3, 3)
  const region = BasicRectangle.fromSides(
    left,
    left + rng.int(0, 12),
    bottom + rng.int(0, 12),
    bottom,
  )

  const obstructions: BasicRectangle[] = []
  const count = rng.int(0, 6)
  for (let i = 0; i < count; i++) {
    const oLeft = rng.int(region.left() - 3, region.right() + 2)
    const oBottom = rng.int(region.bottom() - 3, region.top() + 2)
    obstructions.push(
      BasicRectangle.fromSides(
        oLeft,
        oLeft + rng.int(0, 5),
        oBottom + rng.int(0, 5),
        oBottom,
      ),
    )
  }

  return { region, obstructions }
}
