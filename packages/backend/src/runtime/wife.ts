/**
 * Wife accuracy curve
 *
 * Each judged note earns between +2 (dead on) and -8 (miss) points on a
 * smooth curve of its timing offset. The score is points earned over the
 * points the same notes could have earned.
 */

import type { NoteType, OffsetRecord, TimingData } from '@stepchart/shared'
import {
  WIFE_DEVIATION_MS,
  WIFE_MAX_POINTS,
  WIFE_MISS_POINTS,
  assertNever,
} from '@stepchart/shared'

export function assertTimingScale(ts: number): void {
  if (!Number.isFinite(ts) || ts <= 0) {
    throw new RangeError(`Timing scale must be a positive number (got ${ts})`)
  }
}

/**
 * Points for one judged note
 * @param ts - Timing scale; widens (>1) or narrows (<1) the curve
 */
export function wife(record: OffsetRecord, ts: number = 1.0): number {
  assertTimingScale(ts)
  const { offset, type } = record

  switch (type) {
    case 'tap':
    case 'hold':
    case 'roll':
    case 'lift': {
      if (offset === null) return WIFE_MISS_POINTS
      const avedeviation = WIFE_DEVIATION_MS * ts
      let y = 1.0 - Math.pow(2.0, (-1.0 * offset * offset) / (avedeviation * avedeviation))
      y *= y
      return (WIFE_MAX_POINTS - WIFE_MISS_POINTS) * (1.0 - y) + WIFE_MISS_POINTS
    }
    case 'fake':
    case 'holdEnd':
      return 0.0
    case 'mine':
      // Hitting a mine is the penalty; dodging it is worth nothing
      return offset === null ? 0.0 : WIFE_MISS_POINTS
    default:
      return assertNever(type)
  }
}

/**
 * Most points a note of this type can earn
 */
export function maxPoints(type: NoteType): number {
  switch (type) {
    case 'tap':
    case 'hold':
    case 'roll':
    case 'lift':
      return WIFE_MAX_POINTS
    case 'fake':
    case 'mine':
    case 'holdEnd':
      return 0.0
    default:
      return assertNever(type)
  }
}

/**
 * Earned over possible points. A set with nothing scorable divides by
 * zero; callers check for that first.
 */
export function calculateScore(records: Iterable<OffsetRecord>, ts: number = 1.0): number {
  assertTimingScale(ts)
  let points = 0.0
  let possible = 0.0
  for (const record of records) {
    points += wife(record, ts)
    possible += maxPoints(record.type)
  }
  return points / possible
}

/**
 * Score column-partitioned offsets, column by column
 */
export function scoreTimingData(data: TimingData<OffsetRecord>, ts: number = 1.0): number {
  return calculateScore(data.entries(), ts)
}
