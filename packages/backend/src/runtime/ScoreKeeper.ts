/**
 * Running wife score for a play session
 */

import type { OffsetRecord } from '@stepchart/shared'
import { assertTimingScale, maxPoints, wife } from './wife.js'
import { letterGrade, type LetterGrade } from './grades.js'

export interface ScoreStats {
  points: number
  maxPoints: number
  count: number
  score: number
  grade: LetterGrade | null
}

/**
 * Accumulates notes as they are judged. Only running sums are kept, so
 * feeding notes one at a time gives the same result as a batch.
 */
export class ScoreKeeper {
  public readonly ts: number

  private pointSum: number = 0.0
  private maxPointSum: number = 0.0
  private judgedCount: number = 0

  /**
   * @param ts - Timing scale passed on to the wife curve
   */
  constructor(ts: number = 1.0) {
    assertTimingScale(ts)
    this.ts = ts
  }

  /**
   * Record one judged note
   * @returns Points the note earned
   */
  public add(record: OffsetRecord): number {
    const earned = wife(record, this.ts)
    this.pointSum += earned
    this.maxPointSum += maxPoints(record.type)
    this.judgedCount++
    return earned
  }

  public addAll(records: Iterable<OffsetRecord>): void {
    for (const record of records) {
      this.add(record)
    }
  }

  get points(): number {
    return this.pointSum
  }

  get maxPoints(): number {
    return this.maxPointSum
  }

  get count(): number {
    return this.judgedCount
  }

  public hasScorableNotes(): boolean {
    return this.maxPointSum > 0
  }

  /**
   * Earned over possible points; check hasScorableNotes() first
   */
  public getScore(): number {
    return this.pointSum / this.maxPointSum
  }

  public reset(): void {
    this.pointSum = 0.0
    this.maxPointSum = 0.0
    this.judgedCount = 0
  }

  public getStats(): ScoreStats {
    const scorable = this.hasScorableNotes()
    const score = this.getScore()
    return {
      points: this.pointSum,
      maxPoints: this.maxPointSum,
      count: this.judgedCount,
      score,
      grade: scorable ? letterGrade(score) : null,
    }
  }
}
