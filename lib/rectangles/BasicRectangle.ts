import type { Rectangle, RectangleFactory } from "../rectangle-types"

/**
 * Number-based rectangle stored as its top-left corner plus size. `y` is
 * the top edge and the rectangle extends `height` downward from it.
 */
export class BasicRectangle implements Rectangle<number> {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number,
  ) {}

  static fromSides(
    left: number,
    right: number,
    top: number,
    bottom: number,
  ): BasicRectangle {
    return new BasicRectangle(left, top, right - left, top - bottom)
  }

  left() {
    return this.x
  }

  right() {
    return this.x + this.width
  }

  top() {
    return this.y
  }

  bottom() {
    return this.y - this.height
  }

  toString() {
    return `BasicRectangle(l=${this.left()}, r=${this.right()}, t=${this.top()}, b=${this.bottom()})`
  }
}

export const basicRectangleFactory: RectangleFactory<number, BasicRectangle> =
  {
    fromSides: BasicRectangle.fromSides,
  }
