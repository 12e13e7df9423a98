/**
 * Column-partitioned note lists
 */

import { COLUMN_COUNT } from '../constants.js'

export class TimingData<T> {
  private readonly notes: T[][]

  constructor(columnCount: number = COLUMN_COUNT) {
    this.notes = Array.from({ length: columnCount }, () => [])
  }

  get columnCount(): number {
    return this.notes.length
  }

  /**
   * Total entries across every column
   */
  get size(): number {
    return this.notes.reduce((sum, col) => sum + col.length, 0)
  }

  hasColumn(column: number): boolean {
    return Number.isInteger(column) && column >= 0 && column < this.notes.length
  }

  /**
   * Append an entry to a column
   * @throws RangeError when the column does not exist
   */
  add(entry: T, column: number): void {
    if (!this.hasColumn(column)) {
      throw new RangeError(`Column ${column} outside 0..${this.notes.length - 1}`)
    }
    this.notes[column].push(entry)
  }

  column(column: number): readonly T[] {
    return this.hasColumn(column) ? this.notes[column] : []
  }

  columns(): ReadonlyArray<readonly T[]> {
    return this.notes
  }

  /**
   * Every entry, column by column
   */
  *entries(): IterableIterator<T> {
    for (const col of this.notes) {
      yield* col
    }
  }
}
