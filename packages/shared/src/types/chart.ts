/**
 * Chart data model shared by the parser, the timing pipeline and scoring
 */

import type { Fraction } from '../math/fraction.js'

/**
 * Closed set of note kinds a chart row can hold
 */
export const NOTE_TYPES = ['tap', 'hold', 'holdEnd', 'roll', 'mine', 'lift', 'fake'] as const

export type NoteType = typeof NOTE_TYPES[number]

/**
 * A single note inside a row
 */
export interface RowNote {
  readonly type: NoteType
  readonly column: number
}

/**
 * Every note sharing one position in one measure
 */
export interface NoteRow {
  readonly notes: readonly RowNote[]
}

export interface MeasureRow {
  readonly position: Fraction   // Offset inside the measure, in [0, 1)
  readonly row: NoteRow
}

/**
 * Rows of one measure, positions strictly increasing
 */
export type Measure = readonly MeasureRow[]

/**
 * Raw BPMS entry: float measure-position and beats per minute
 */
export interface TempoChange {
  readonly position: number
  readonly bpm: number
}

export interface ChartMetadata {
  readonly title?: string
  readonly offset?: number              // Seconds notes are shifted earlier (source value negated)
  readonly bpms: readonly TempoChange[]
  readonly bpm?: number                 // Display tempo (last BPMS entry), not used for timing
}

export interface Chart {
  readonly metadata: ChartMetadata
  readonly measures: readonly Measure[]
}

/**
 * A whole source file: shared metadata plus one chart per NOTES field
 */
export interface Simfile {
  readonly metadata: ChartMetadata
  readonly charts: readonly Chart[]
}

/**
 * Tempo change with its absolute start time worked out
 */
export interface ResolvedTempoSegment {
  readonly measure: number
  readonly position: Fraction
  readonly bpm: number
  readonly startMs: number
}

/**
 * Note placed on the absolute timeline
 */
export interface TimedNote<P = undefined> {
  readonly time: number                 // Integer milliseconds
  readonly type: NoteType
  readonly column: number
  readonly payload: P
}

/**
 * Judged note: offset in ms (negative = early), null when never hit
 */
export interface OffsetRecord {
  readonly offset: number | null
  readonly type: NoteType
}

/**
 * Caller hook that attaches a rendering payload to each converted note.
 * The second argument is reserved and always 0.
 */
export type PayloadLookup<P> = (
  measure: number,
  reserved: number,
  position: Fraction,
  type: NoteType,
  column: number
) => P
