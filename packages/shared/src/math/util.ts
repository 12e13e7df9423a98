/**
 * Small math and control-flow helpers
 */

/**
 * Greatest common divisor of two integers (always >= 0)
 */
export function gcd(a: number, b: number): number {
  a = Math.abs(a)
  b = Math.abs(b)
  while (b !== 0) {
    const t = a % b
    a = b
    b = t
  }
  return a
}

/**
 * Exhaustiveness guard for closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`)
}
