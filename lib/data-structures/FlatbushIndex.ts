import Flatbush from "flatbush"

export interface ISpatialIndex<T> {
  insert(item: T, minX: number, minY: number, maxX: number, maxY: number): void
  finish(): void
  search(minX: number, minY: number, maxX: number, maxY: number): T[]
}

/**
 * Static index over a fixed number of boxes. Items come back from `search`
 * in insertion order.
 */
export class FlatbushIndex<T> implements ISpatialIndex<T> {
  private index: Flatbush | null
  private items: T[] = []

  constructor(numItems: number) {
    // Flatbush rejects an empty index
    this.index = numItems > 0 ? new Flatbush(numItems) : null
  }

  insert(item: T, minX: number, minY: number, maxX: number, maxY: number) {
    if (!this.index || this.items.length >= this.index.numItems) {
      throw new Error("Exceeded initial capacity")
    }
    this.items.push(item)
    this.index.add(minX, minY, maxX, maxY)
  }

  finish() {
    this.index?.finish()
  }

  search(minX: number, minY: number, maxX: number, maxY: number): T[] {
    if (!this.index) return []
    const ids = this.index.search(minX, minY, maxX, maxY)
    ids.sort((a, b) => a - b)
    const found: T[] = []
    for (const id of ids) {
      const item = this.items[id]
      if (item !== undefined) found.push(item)
    }
    return found
  }
}
