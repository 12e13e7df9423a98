/**
 * Linear-scan cursor over a resolved tempo map
 */

import type { Fraction, ResolvedTempoSegment } from '@stepchart/shared'
import { spanMs } from './tempo.js'

/**
 * True once a row at (measure, position) has reached the segment's start
 */
export function reachesSegment(
  segment: ResolvedTempoSegment,
  measure: number,
  position: Fraction
): boolean {
  return measure > segment.measure ||
    (measure === segment.measure && segment.position.lte(position))
}

/**
 * Absolute time of a row measured from the segment it falls in
 */
export function rowTimeMs(
  segment: ResolvedTempoSegment,
  measure: number,
  position: Fraction,
  rate: number = 1
): number {
  const elapsed = spanMs(measure - segment.measure, position.sub(segment.position), segment.bpm)
  return (segment.startMs + elapsed) / rate
}

/**
 * Two-state cursor: segment i is active, segment i+1 (if any) is pending.
 * Rows must be fed in chart order. The cursor only moves forward.
 */
export class TempoCursor {
  private readonly segments: readonly ResolvedTempoSegment[]
  private index: number = 0

  constructor(segments: readonly ResolvedTempoSegment[]) {
    if (segments.length === 0) {
      throw new RangeError('TempoCursor needs at least one segment')
    }
    this.segments = segments
  }

  get currentIndex(): number {
    return this.index
  }

  get current(): ResolvedTempoSegment {
    return this.segments[this.index]
  }

  get next(): ResolvedTempoSegment | undefined {
    return this.index + 1 < this.segments.length ? this.segments[this.index + 1] : undefined
  }

  shouldAdvance(measure: number, position: Fraction): boolean {
    const next = this.next
    return next !== undefined && reachesSegment(next, measure, position)
  }

  /**
   * Promote pending segments until the next one lies after the row.
   * Several tempo changes between two rows are crossed in one call.
   * @returns number of segments crossed
   */
  advance(measure: number, position: Fraction): number {
    let crossed = 0
    while (this.shouldAdvance(measure, position)) {
      this.index++
      crossed++
    }
    return crossed
  }

  reset(): void {
    this.index = 0
  }
}
