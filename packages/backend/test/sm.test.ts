import { describe, it, expect } from 'vitest'
import {
  parseSimfile,
  parseChart,
  parseMeasure,
  parseNoteLine,
  parseBpms,
  parseOffset,
  detectFormat,
  loadChart,
} from '../src/parsers/index.js'
import { SIMFILE, simfile } from './fixtures.js'

describe('Chart parser', () => {
  describe('metadata', () => {
    it('should read title, negated offset and tempo list', () => {
      const { metadata } = parseSimfile(SIMFILE)
      expect(metadata.title).toBe('Test Song')
      expect(metadata.offset).toBe(0.25)
      expect(metadata.bpms).toEqual([
        { position: 0, bpm: 120 },
        { position: 2, bpm: 240 },
      ])
      expect(metadata.bpm).toBe(240)
    })

    it('should leave a malformed offset unset', () => {
      expect(parseOffset('abc')).toBeUndefined()
      expect(parseOffset('1.5x')).toBeUndefined()
      expect(parseOffset(undefined)).toBeUndefined()
      expect(parseSimfile('#OFFSET:abc;').metadata.offset).toBeUndefined()
    })

    it('should require the offset terminator', () => {
      expect(parseSimfile('#OFFSET:0.5\n#TITLE:x;').metadata.offset).toBeUndefined()
    })

    it('should store a zero offset as plain zero', () => {
      expect(parseOffset('0.000')).toBe(0)
      expect(parseOffset(' -1.5 ')).toBe(1.5)
    })

    it('should empty the tempo list on any bad pair', () => {
      expect(parseBpms('0=120,abc')).toEqual([])
      expect(parseBpms('0=120,1=')).toEqual([])
      expect(parseBpms('0=120,')).toEqual([])
      expect(parseBpms('0=0')).toEqual([])
      expect(parseBpms('0=120=1')).toEqual([])
      expect(parseBpms(undefined)).toEqual([])
      expect(parseSimfile('#BPMS:0=120').metadata.bpms).toEqual([])
    })

    it('should empty the tempo list when a position is too large for a measure index', () => {
      expect(parseBpms('0=120,1e17=140')).toEqual([])
      expect(parseBpms('-1e300=120')).toEqual([])
      expect(parseBpms('0=120,9007199254740991=140')).toEqual([
        { position: 0, bpm: 120 },
        { position: 9007199254740991, bpm: 140 },
      ])
    })

    it('should stop offset and tempo values at their first terminator', () => {
      const parsed = parseSimfile('#BPMS:0=120;\n// note; see below\n#OFFSET:0.5; // shift; later\n#TITLE:x;')
      expect(parsed.metadata.bpms).toEqual([{ position: 0, bpm: 120 }])
      expect(parsed.metadata.offset).toBe(-0.5)
      expect(parsed.metadata.title).toBe('x')
    })

    it('should allow whitespace between pairs', () => {
      expect(parseBpms(' 0.000=150.5 ,\n 1.5=75 ')).toEqual([
        { position: 0, bpm: 150.5 },
        { position: 1.5, bpm: 75 },
      ])
    })

    it('should leave display bpm unset without tempo changes', () => {
      expect(parseSimfile('#TITLE:Only;').metadata.bpm).toBeUndefined()
    })

    it('should ignore unknown tags', () => {
      const parsed = parseSimfile('#FOO:bar;\n#TITLE:Kept;\n#BANNER:x.png;')
      expect(parsed.metadata.title).toBe('Kept')
      expect(parsed.charts).toHaveLength(0)
    })
  })

  describe('note rows', () => {
    it('should map grid characters to note types by column', () => {
      expect(parseNoteLine('1234').notes).toEqual([
        { type: 'tap', column: 0 },
        { type: 'hold', column: 1 },
        { type: 'holdEnd', column: 2 },
        { type: 'roll', column: 3 },
      ])
      expect(parseNoteLine('MLF0').notes).toEqual([
        { type: 'mine', column: 0 },
        { type: 'lift', column: 1 },
        { type: 'fake', column: 2 },
      ])
    })

    it('should ignore unknown characters', () => {
      expect(parseNoteLine('0K1x').notes).toEqual([{ type: 'tap', column: 2 }])
    })

    it('should assign n/k positions in lowest terms', () => {
      const measure = parseMeasure(['1000', '0000', '0000', '0000'])
      expect(measure.map(r => r.position.toString())).toEqual(['0/1', '1/4', '1/2', '3/4'])
    })

    it('should use thirds exactly', () => {
      const measure = parseMeasure(['1000', '0100', '0010'])
      expect(measure.map(r => r.position.toString())).toEqual(['0/1', '1/3', '2/3'])
    })

    it('should skip blank lines when counting rows', () => {
      const measure = parseMeasure(['1000', '', '0100'])
      expect(measure.map(r => r.position.toString())).toEqual(['0/1', '1/2'])
    })
  })

  describe('NOTES', () => {
    it('should split measures on comma lines after the header', () => {
      const chart = parseChart(SIMFILE)
      expect(chart.measures).toHaveLength(3)
      expect(chart.measures[0]).toHaveLength(4)
      expect(chart.measures[1][2].row.notes).toEqual([{ type: 'holdEnd', column: 0 }])
      expect(chart.measures[2].map(r => r.position.toString())).toEqual(['0/1', '1/3', '2/3'])
      expect(chart.measures[2][1].row.notes).toEqual([
        { type: 'lift', column: 1 },
        { type: 'roll', column: 2 },
      ])
    })

    it('should keep the index of an empty measure', () => {
      const chart = parseChart(simfile('0=120', ['1000', ',', ',', '0001']))
      expect(chart.measures).toHaveLength(3)
      expect(chart.measures[1]).toHaveLength(0)
      expect(chart.measures[2][0].row.notes).toEqual([{ type: 'tap', column: 3 }])
    })

    it('should keep leading blanks as empty columns', () => {
      const chart = parseChart(simfile('0=120', [' 100', '  ,  ', '0001  ']))
      expect(chart.measures).toHaveLength(2)
      expect(chart.measures[0][0].row.notes).toEqual([{ type: 'tap', column: 1 }])
      expect(chart.measures[1][0].row.notes).toEqual([{ type: 'tap', column: 3 }])
    })

    it('should accept CRLF line endings', () => {
      const chart = parseChart(simfile('0=120', ['1000', '0100']).replace(/\n/g, '\r\n'))
      expect(chart.measures[0].map(r => r.position.toString())).toEqual(['0/1', '1/2'])
    })

    it('should parse every NOTES section', () => {
      const text = simfile('0=120', ['1000']) + '\n' + simfile('0=120', ['0001', '0010'])
      const parsed = parseSimfile(text)
      expect(parsed.charts).toHaveLength(2)
      expect(parsed.charts[1].measures[0]).toHaveLength(2)
      expect(parseChart(text, 1).measures[0][0].row.notes).toEqual([{ type: 'tap', column: 3 }])
    })

    it('should return an empty chart for a missing section', () => {
      const chart = parseChart('#TITLE:No notes;', 0)
      expect(chart.measures).toEqual([])
      expect(chart.metadata.title).toBe('No notes')
    })
  })

  describe('format detection', () => {
    it('should detect step charts', () => {
      expect(detectFormat(SIMFILE)).toBe('sm')
      expect(detectFormat('{"judgeLineList": []}')).toBe('unknown')
    })

    it('should reject unknown formats', () => {
      expect(() => loadChart('not a chart')).toThrow('Unknown or unsupported chart format')
      expect(loadChart(SIMFILE).measures).toHaveLength(3)
    })
  })
})
