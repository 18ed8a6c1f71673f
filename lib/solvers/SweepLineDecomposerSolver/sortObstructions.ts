import type { Coordinate } from "../../types/coordinate-types"
import type { Rectangle } from "../../rectangle-types"
import { gt, lt } from "../../coordinates/compare"

/**
 * Copy the obstructions that reach into the region's vertical extent,
 * ordered by descending top. Ties keep their input order.
 */
export function sortObstructions<T>(
  c: Coordinate<T>,
  region: Rectangle<T>,
  obstructions: readonly Rectangle<T>[],
): Rectangle<T>[] {
  return obstructions
    .filter(
      (o) =>
        !lt(c, o.top(), region.bottom()) && !gt(c, o.bottom(), region.top()),
    )
    .sort((a, b) => c.compare(b.top(), a.top()))
}
