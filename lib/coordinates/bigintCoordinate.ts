import { defineCoordinate } from "./defineCoordinate"

export const bigintCoordinate = defineCoordinate<bigint>({
  zero: 0n,
  one: 1n,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  toNumber: (a) => Number(a),
})
