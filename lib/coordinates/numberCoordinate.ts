import { defineCoordinate } from "./defineCoordinate"

/**
 * Plain JS numbers. Sweeps step by `one`, so values are expected to sit on
 * the integer lattice.
 */
export const numberCoordinate = defineCoordinate<number>({
  zero: 0,
  one: 1,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  compare: (a, b) => a - b,
  toNumber: (a) => a,
})
