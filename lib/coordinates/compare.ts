import type { Coordinate } from "../types/coordinate-types"

export const lt = <T>(c: Coordinate<T>, a: T, b: T) => c.compare(a, b) < 0
export const lte = <T>(c: Coordinate<T>, a: T, b: T) => c.compare(a, b) <= 0
export const gt = <T>(c: Coordinate<T>, a: T, b: T) => c.compare(a, b) > 0
export const gte = <T>(c: Coordinate<T>, a: T, b: T) => c.compare(a, b) >= 0
export const eq = <T>(c: Coordinate<T>, a: T, b: T) => c.compare(a, b) === 0
