import type {
  Coordinate,
  CoordinateBase,
} from "../types/coordinate-types"

/** Complete a coordinate by deriving min/max from its ordering. */
export function defineCoordinate<T>(base: CoordinateBase<T>): Coordinate<T> {
  return {
    ...base,
    min: (a, b) => (base.compare(a, b) <= 0 ? a : b),
    max: (a, b) => (base.compare(a, b) >= 0 ? a : b),
  }
}
