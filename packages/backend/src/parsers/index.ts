/**
 * Chart parser entry point
 * Detects the source format and routes to the matching parser
 */

import type { Chart } from '@stepchart/shared'
import { parseChart } from './sm.js'

export type ChartFormat = 'sm' | 'unknown'

/**
 * Detect chart format from source text
 */
export function detectFormat(text: string): ChartFormat {
  if (/#\s*(NOTES|BPMS)\s*:/i.test(text)) return 'sm'
  return 'unknown'
}

/**
 * Parse chart text with automatic format detection
 */
export function loadChart(text: string, index: number = 0): Chart {
  const format = detectFormat(text)

  switch (format) {
    case 'sm':
      return parseChart(text, index)

    default:
      throw new Error(`Unknown or unsupported chart format`)
  }
}

export {
  parseSimfile,
  parseChart,
  parseNotesBody,
  parseMeasure,
  parseNoteLine,
  parseBpms,
  parseOffset,
} from './sm.js'
