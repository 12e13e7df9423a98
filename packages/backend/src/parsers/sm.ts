/**
 * Step chart (.sm) parser
 *
 * Source text is a run of `#TAG:VALUE;` fields. Only TITLE, OFFSET, BPMS and
 * NOTES are read; anything else is skipped. Malformed values leave the field
 * unset instead of failing the whole file.
 */

import type {
  Chart,
  ChartMetadata,
  Measure,
  NoteRow,
  NoteType,
  RowNote,
  Simfile,
  TempoChange,
} from '@stepchart/shared'
import { Fraction, NOTES_HEADER_LINES } from '@stepchart/shared'

/**
 * Grid characters that place a note; every other character is empty
 */
const NOTE_CHARS: Readonly<Partial<Record<string, NoteType>>> = {
  '1': 'tap',
  '2': 'hold',
  '3': 'holdEnd',
  '4': 'roll',
  M: 'mine',
  L: 'lift',
  F: 'fake',
}

const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

interface RawField {
  tag: string
  body: string
  value: string | undefined   // body up to its last ';', undefined when unterminated
  scalar: string | undefined  // body up to its first ';'; anything after it is ignored
}

/**
 * Split source text into tagged fields
 */
function splitFields(text: string): RawField[] {
  const fields: RawField[] = []
  for (const chunk of text.split('#')) {
    const colon = chunk.indexOf(':')
    if (colon < 0) continue
    const tag = chunk.slice(0, colon).trim().toUpperCase()
    const body = chunk.slice(colon + 1)
    const first = body.indexOf(';')
    const last = body.lastIndexOf(';')
    fields.push({
      tag,
      body,
      value: last < 0 ? undefined : body.slice(0, last),
      scalar: first < 0 ? undefined : body.slice(0, first),
    })
  }
  return fields
}

/**
 * Parse a float token, rejecting trailing garbage that parseFloat would accept
 */
function parseFloatStrict(token: string): number | undefined {
  const s = token.trim()
  if (!FLOAT_RE.test(s)) return undefined
  const n = Number(s)
  return Number.isFinite(n) ? n : undefined
}

/**
 * OFFSET value, negated so that it reads as "seconds to shift notes earlier"
 */
export function parseOffset(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const n = parseFloatStrict(value)
  if (n === undefined) return undefined
  return n === 0 ? 0 : -n
}

/**
 * BPMS value: `pos=bpm,pos=bpm,...`. Any bad pair empties the whole list.
 */
export function parseBpms(value: string | undefined): TempoChange[] {
  if (value === undefined) return []
  const changes: TempoChange[] = []
  for (const pair of value.split(',')) {
    const parts = pair.split('=')
    if (parts.length !== 2) return []
    const position = parseFloatStrict(parts[0])
    const bpm = parseFloatStrict(parts[1])
    if (position === undefined || bpm === undefined || bpm <= 0) return []
    // Measure indices must stay exact integers
    if (Math.abs(position) > Number.MAX_SAFE_INTEGER) return []
    changes.push({ position, bpm })
  }
  return changes
}

/**
 * One grid line: character index is the column
 */
export function parseNoteLine(line: string): NoteRow {
  const notes: RowNote[] = []
  Array.from(line).forEach((ch, column) => {
    const type = NOTE_CHARS[ch]
    if (type) notes.push({ type, column })
  })
  return { notes }
}

/**
 * Give row n of k the exact position n/k. Blank lines are not rows.
 */
export function parseMeasure(lines: readonly string[]): Measure {
  const rows = lines.filter(ln => ln.length > 0)
  return rows.map((line, n) => ({
    position: Fraction.of(n, rows.length),
    row: parseNoteLine(line),
  }))
}

function stripComment(line: string): string {
  const i = line.indexOf('//')
  // Leading blanks are kept: they shift columns
  return (i < 0 ? line : line.slice(0, i)).trimEnd()
}

/**
 * NOTES body: header lines, then measures separated by `,` lines
 */
export function parseNotesBody(body: string): Measure[] {
  const lines = body.split('\n').slice(NOTES_HEADER_LINES).map(stripComment)
  const measures: Measure[] = []
  let current: string[] = []
  for (const line of lines) {
    if (line.trim() === ',') {
      measures.push(parseMeasure(current))
      current = []
    } else {
      current.push(line)
    }
  }
  measures.push(parseMeasure(current))
  return measures
}

/**
 * Parse a whole file into its metadata and every NOTES section
 */
export function parseSimfile(text: string): Simfile {
  let title: string | undefined
  let offset: number | undefined
  let bpms: TempoChange[] = []
  const bodies: string[] = []

  for (const field of splitFields(text)) {
    switch (field.tag) {
      case 'TITLE':
        title = field.value ?? field.body.trim()
        break
      case 'OFFSET':
        offset = parseOffset(field.scalar)
        break
      case 'BPMS':
        bpms = parseBpms(field.scalar)
        break
      case 'NOTES':
        bodies.push(field.value ?? field.body)
        break
      default:
        // Unknown tags are skipped
        break
    }
  }

  const metadata: ChartMetadata = {
    title,
    offset,
    bpms,
    bpm: bpms.length ? bpms[bpms.length - 1].bpm : undefined,
  }

  return {
    metadata,
    charts: bodies.map(body => ({ metadata, measures: parseNotesBody(body) })),
  }
}

/**
 * Parse one chart out of a file. A missing NOTES section gives a chart
 * with no measures.
 */
export function parseChart(text: string, index: number = 0): Chart {
  const simfile = parseSimfile(text)
  return simfile.charts[index] ?? { metadata: simfile.metadata, measures: [] }
}
