/**
 * Tempo map resolution
 *
 * Turns the raw BPMS list into segments that each know the absolute time
 * they start at, integrating one segment at a time. Assumes 4/4 throughout.
 */

import type { ChartMetadata, ResolvedTempoSegment, TempoChange } from '@stepchart/shared'
import { Fraction, MS_PER_MEASURE_AT_1_BPM, POSITION_MAX_DENOMINATOR } from '@stepchart/shared'

export interface MeasurePosition {
  measure: number
  position: Fraction
}

/**
 * Split a float measure-position into (measure index, exact remainder).
 *
 * The remainder is the closest fraction with a denominator of at most
 * POSITION_MAX_DENOMINATOR; anything finer than a 192nd is not preserved.
 * A remainder that rounds up to a whole measure carries over.
 */
export function decomposePosition(x: number): MeasurePosition {
  const measure = Math.floor(x)
  const position = Fraction.approximate(x - measure, POSITION_MAX_DENOMINATOR)
  if (position.compare(Fraction.ONE) >= 0) {
    return { measure: measure + 1, position: Fraction.ZERO }
  }
  return { measure, position }
}

/**
 * Real time covered by a span of measures at a fixed tempo
 */
export function spanMs(measures: number, fraction: Fraction, bpm: number): number {
  return (measures + fraction.toNumber()) * MS_PER_MEASURE_AT_1_BPM / bpm
}

/**
 * Chart offset in milliseconds (unset counts as zero)
 */
export function offsetMsOf(metadata: ChartMetadata): number {
  return (metadata.offset ?? 0) * 1000
}

/**
 * Resolve every tempo change to an absolute start time.
 * Output order matches input order; an empty list yields no segments.
 */
export function resolveTempoMap(
  bpms: readonly TempoChange[],
  offsetMs: number = 0
): ResolvedTempoSegment[] {
  const segments: ResolvedTempoSegment[] = []

  for (const change of bpms) {
    const { measure, position } = decomposePosition(change.position)
    const prev = segments.length ? segments[segments.length - 1] : undefined
    const startMs = prev
      ? prev.startMs + spanMs(measure - prev.measure, position.sub(prev.position), prev.bpm)
      : offsetMs
    segments.push({ measure, position, bpm: change.bpm, startMs })
  }

  return segments
}
