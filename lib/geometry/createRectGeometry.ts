import type { Coordinate } from "../types/coordinate-types"
import type { Rectangle, RectangleFactory } from "../rectangle-types"
import {
  containsPoint,
  containsRect,
  rectArea,
  rectHeight,
  rectIntersection,
  rectPerimeter,
  rectsEqual,
  rectsOverlap,
  rectWidth,
  translateRect,
} from "./rect-geometry"

export interface RectGeometry<T, R extends Rectangle<T>> {
  coordinate: Coordinate<T>
  factory: RectangleFactory<T, R>
  width(r: Rectangle<T>): T
  height(r: Rectangle<T>): T
  perimeter(r: Rectangle<T>): T
  area(r: Rectangle<T>): T
  translate(r: Rectangle<T>, dx: T, dy: T): R
  containsPoint(r: Rectangle<T>, x: T, y: T): boolean
  containsRect(outer: Rectangle<T>, inner: Rectangle<T>): boolean
  overlaps(a: Rectangle<T>, b: Rectangle<T>): boolean
  intersection(a: Rectangle<T>, b: Rectangle<T>): R | null
  equals(a: Rectangle<T>, b: Rectangle<T>): boolean
}

/**
 * Bind the free geometry functions to one coordinate type and rectangle
 * representation.
 */
export function createRectGeometry<T, R extends Rectangle<T>>(
  coordinate: Coordinate<T>,
  factory: RectangleFactory<T, R>,
): RectGeometry<T, R> {
  const c = coordinate
  return {
    coordinate,
    factory,
    width: (r) => rectWidth(c, r),
    height: (r) => rectHeight(c, r),
    perimeter: (r) => rectPerimeter(c, r),
    area: (r) => rectArea(c, r),
    translate: (r, dx, dy) => translateRect(c, factory, r, dx, dy),
    containsPoint: (r, x, y) => containsPoint(c, r, x, y),
    containsRect: (outer, inner) => containsRect(c, outer, inner),
    overlaps: (a, b) => rectsOverlap(c, a, b),
    intersection: (a, b) => rectIntersection(c, factory, a, b),
    equals: (a, b) => rectsEqual(c, a, b),
  }
}
