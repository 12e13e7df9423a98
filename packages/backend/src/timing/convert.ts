/**
 * Position-to-time conversion
 *
 * Walks a chart's rows in order next to its resolved tempo map and places
 * every note on the absolute timeline, one list per column.
 */

import type {
  Chart,
  Fraction,
  NoteType,
  PayloadLookup,
  ResolvedTempoSegment,
  TimedNote,
} from '@stepchart/shared'
import { COLUMN_COUNT, TimingData } from '@stepchart/shared'
import { TempoCursor, rowTimeMs } from './cursor.js'
import { offsetMsOf, resolveTempoMap } from './tempo.js'

/**
 * Note left out because its column is not on the playfield
 */
export interface DroppedNote {
  measure: number
  position: Fraction
  type: NoteType
  column: number
}

export interface ConvertOptions {
  /** Playback rate; >1 speeds the chart up (default 1) */
  rate?: number
  /** Playfield width (default COLUMN_COUNT) */
  columnCount?: number
  /** Called for each note dropped for being off the playfield */
  onDroppedNote?: (note: DroppedNote) => void
}

/**
 * Lookup for callers that need no rendering payload
 */
export const noPayload: PayloadLookup<undefined> = () => undefined

export function assertRate(rate: number): void {
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new RangeError(`Playback rate must be a positive number (got ${rate})`)
  }
}

/**
 * Convert a chart against an already resolved tempo map
 * @param payload - Called once per emitted note to build its rendering payload
 */
export function toTimingData<P>(
  chart: Chart,
  segments: readonly ResolvedTempoSegment[],
  payload: PayloadLookup<P>,
  options: ConvertOptions = {}
): TimingData<TimedNote<P>> {
  const { rate = 1, columnCount = COLUMN_COUNT, onDroppedNote } = options
  assertRate(rate)

  const output = new TimingData<TimedNote<P>>(columnCount)
  if (segments.length === 0) return output

  const cursor = new TempoCursor(segments)

  chart.measures.forEach((measure, measureIndex) => {
    for (const { position, row } of measure) {
      cursor.advance(measureIndex, position)
      // + 0 folds -0 from trunc into 0
      const time = Math.trunc(rowTimeMs(cursor.current, measureIndex, position, rate)) + 0

      for (const { type, column } of row.notes) {
        if (!output.hasColumn(column)) {
          onDroppedNote?.({ measure: measureIndex, position, type, column })
          continue
        }
        output.add(
          { time, type, column, payload: payload(measureIndex, 0, position, type, column) },
          column
        )
      }
    }
  })

  return output
}

/**
 * Resolve the chart's own tempo map and offset, then convert
 */
export function timeChart<P>(
  chart: Chart,
  payload: PayloadLookup<P>,
  options: ConvertOptions = {}
): TimingData<TimedNote<P>> {
  const segments = resolveTempoMap(chart.metadata.bpms, offsetMsOf(chart.metadata))
  return toTimingData(chart, segments, payload, options)
}
