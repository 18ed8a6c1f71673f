import { expect, test } from "vitest"
import { numberCoordinate } from "../lib/coordinates/numberCoordinate"
import { bigintCoordinate } from "../lib/coordinates/bigintCoordinate"
import { defineCoordinate } from "../lib/coordinates/defineCoordinate"
import { gt, gte, lt, lte, eq } from "../lib/coordinates/compare"

test("number coordinate arithmetic and ordering", () => {
  const c = numberCoordinate
  expect(c.add(2, 3)).toBe(5)
  expect(c.sub(2, 3)).toBe(-1)
  expect(c.mul(4, 3)).toBe(12)
  expect(c.min(4, -1)).toBe(-1)
  expect(c.max(4, -1)).toBe(4)
  expect(c.one).toBe(1)
  expect(c.zero).toBe(0)
})

test("bigint coordinate arithmetic and ordering", () => {
  const c = bigintCoordinate
  expect(c.add(2n, 3n)).toBe(5n)
  expect(c.sub(2n, 3n)).toBe(-1n)
  expect(c.mul(4n, 3n)).toBe(12n)
  expect(c.compare(1n, 2n)).toBe(-1)
  expect(c.compare(2n, 2n)).toBe(0)
  expect(c.compare(3n, 2n)).toBe(1)
  expect(c.min(9007199254740993n, 9007199254740992n)).toBe(9007199254740992n)
  expect(c.toNumber(42n)).toBe(42)
})

test("comparison helpers follow compare()", () => {
  const c = numberCoordinate
  expect([lt(c, 1, 2), lte(c, 2, 2), gt(c, 1, 2), gte(c, 2, 2), eq(c, 2, 3)]).toEqual([
    true,
    true,
    false,
    true,
    false,
  ])
})

test("defineCoordinate derives min and max from a custom ordering", () => {
  // Ordered by absolute value
  const byMagnitude = defineCoordinate<number>({
    zero: 0,
    one: 1,
    add: (a, b) => a + b,
    sub: (a, b) => a - b,
    mul: (a, b) => a * b,
    compare: (a, b) => Math.abs(a) - Math.abs(b),
    toNumber: (a) => a,
  })
  expect(byMagnitude.min(-5, 3)).toBe(3)
  expect(byMagnitude.max(-5, 3)).toBe(-5)
})
