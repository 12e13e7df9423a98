import type { Fraction, Quantization } from '@stepchart/shared'
import { QUANTIZATIONS } from '@stepchart/shared'

/**
 * Coarsest note snap whose grid contains the position
 * (1/4 -> 4th, 1/3 -> 12th, 3/16 -> 16th). Off-grid positions fall back to 192nd.
 */
export function quantizationOf(position: Fraction): Quantization {
  for (const q of QUANTIZATIONS) {
    if (q % position.den === 0) return q
  }
  return 192
}
