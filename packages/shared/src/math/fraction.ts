/**
 * Exact rational arithmetic for note positions.
 *
 * Subdivisions such as thirds and twelfths have no exact binary float form,
 * so positions inside a measure are kept as reduced num/den pairs and only
 * turned into floats at the last step of a time calculation.
 */

import { POSITION_MAX_DENOMINATOR } from '../constants.js'
import { gcd } from './util.js'

export class Fraction {
  readonly num: number
  readonly den: number

  static readonly ZERO = new Fraction(0, 1)
  static readonly ONE = new Fraction(1, 1)

  private constructor(num: number, den: number) {
    this.num = num
    this.den = den
  }

  /**
   * Build a reduced fraction; the sign always lives on the numerator
   */
  static of(num: number, den: number = 1): Fraction {
    if (!Number.isSafeInteger(num) || !Number.isSafeInteger(den)) {
      throw new RangeError(`Fraction parts must be safe integers (got ${num}/${den})`)
    }
    if (den === 0) {
      throw new RangeError('Fraction denominator must not be zero')
    }
    if (num === 0) return Fraction.ZERO
    const g = gcd(num, den)
    const sign = den < 0 ? -1 : 1
    return new Fraction((sign * num) / g, (sign * den) / g)
  }

  static fromInteger(n: number): Fraction {
    return Fraction.of(n, 1)
  }

  /**
   * Best rational approximation of x whose denominator does not exceed
   * maxDenominator. Walks the continued fraction of x and, once the next
   * convergent would overshoot the bound, picks between the last convergent
   * and the largest admissible semiconvergent.
   */
  static approximate(x: number, maxDenominator: number = POSITION_MAX_DENOMINATOR): Fraction {
    if (!Number.isFinite(x)) {
      throw new RangeError(`Cannot approximate non-finite value ${x}`)
    }
    if (!Number.isSafeInteger(maxDenominator) || maxDenominator < 1) {
      throw new RangeError(`maxDenominator must be a positive integer (got ${maxDenominator})`)
    }

    const sign = x < 0 ? -1 : 1
    const value = Math.abs(x)

    // (p0/q0, p1/q1) are the two most recent convergents
    let p0 = 0
    let q0 = 1
    let p1 = 1
    let q1 = 0
    let rest = value

    for (;;) {
      const a = Math.floor(rest)
      const q2 = q0 + a * q1
      if (q2 > maxDenominator) {
        const k = Math.floor((maxDenominator - q0) / q1)
        const semi = Fraction.of(p0 + k * p1, q0 + k * q1)
        const conv = Fraction.of(p1, q1)
        const best =
          Math.abs(conv.toNumber() - value) <= Math.abs(semi.toNumber() - value) ? conv : semi
        return Fraction.of(sign * best.num, best.den)
      }
      const p2 = p0 + a * p1
      p0 = p1
      q0 = q1
      p1 = p2
      q1 = q2

      const frac = rest - a
      if (frac === 0) break
      rest = 1 / frac
    }

    return Fraction.of(sign * p1, q1)
  }

  add(other: Fraction): Fraction {
    return Fraction.of(this.num * other.den + other.num * this.den, this.den * other.den)
  }

  sub(other: Fraction): Fraction {
    return Fraction.of(this.num * other.den - other.num * this.den, this.den * other.den)
  }

  /**
   * -1, 0 or 1 as this is less than, equal to or greater than other
   */
  compare(other: Fraction): -1 | 0 | 1 {
    const lhs = this.num * other.den
    const rhs = other.num * this.den
    return lhs < rhs ? -1 : lhs > rhs ? 1 : 0
  }

  equals(other: Fraction): boolean {
    return this.num === other.num && this.den === other.den
  }

  lt(other: Fraction): boolean {
    return this.compare(other) < 0
  }

  lte(other: Fraction): boolean {
    return this.compare(other) <= 0
  }

  /**
   * Largest integer not greater than this value
   */
  floor(): number {
    return Math.floor(this.num / this.den)
  }

  /**
   * this - floor(this), always in [0, 1)
   */
  fract(): Fraction {
    return this.sub(Fraction.fromInteger(this.floor()))
  }

  toNumber(): number {
    return this.num / this.den
  }

  toString(): string {
    return `${this.num}/${this.den}`
  }

  toJSON(): string {
    return this.toString()
  }
}
