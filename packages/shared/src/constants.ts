// Playfield and note grid constants

/** Playfield columns (4-panel single) */
export const COLUMN_COUNT = 4

/**
 * Milliseconds covered by one 4/4 measure at 1 BPM
 * 60,000 ms/min * 4 beats/measure
 */
export const MS_PER_MEASURE_AT_1_BPM = 240_000

/** Lines at the top of a NOTES body that hold the per-chart header */
export const NOTES_HEADER_LINES = 5

/**
 * Largest denominator used when a float measure-position from BPMS is
 * turned back into a Fraction (192nd notes are the finest grid charts use)
 */
export const POSITION_MAX_DENOMINATOR = 192

// Wife curve (milliseconds / points)
export const WIFE_DEVIATION_MS = 95.0
export const WIFE_MAX_POINTS = 2.0
export const WIFE_MISS_POINTS = -8.0

/** Note snaps from coarsest to finest */
export const QUANTIZATIONS = [4, 8, 12, 16, 24, 32, 48, 64, 192] as const

export type Quantization = typeof QUANTIZATIONS[number]
