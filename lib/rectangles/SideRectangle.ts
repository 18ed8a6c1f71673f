import type { Rectangle, RectangleFactory } from "../rectangle-types"

/** Generic rectangle that keeps its four sides as given. */
export class SideRectangle<T> implements Rectangle<T> {
  constructor(
    private readonly l: T,
    private readonly r: T,
    private readonly t: T,
    private readonly b: T,
  ) {}

  left() {
    return this.l
  }

  right() {
    return this.r
  }

  top() {
    return this.t
  }

  bottom() {
    return this.b
  }
}

export function sideRectangleFactory<T>(): RectangleFactory<
  T,
  SideRectangle<T>
> {
  return {
    fromSides: (left, right, top, bottom) =>
      new SideRectangle(left, right, top, bottom),
  }
}
