import { describe, expect, it } from 'vitest'
import { InvalidNumberError } from './errors'
import { normalizeNumber, roundHalfEven, sumOf } from './numeric'

describe('normalizeNumber', () => {
  it('keeps whole numbers whole so they serialize without a fraction', () => {
    expect(JSON.stringify(normalizeNumber(25.0))).toBe('25')
    expect(JSON.stringify(normalizeNumber(24.999))).toBe('25')
  })

  it('keeps up to two decimal places', () => {
    expect(JSON.stringify(normalizeNumber(22.5))).toBe('22.5')
    expect(normalizeNumber(10.556)).toBe(10.56)
    expect(normalizeNumber(10.555)).toBe(10.55)
    expect(normalizeNumber(0.1 + 0.2)).toBe(0.3)
  })

  it('rounds the exact binary value rather than the decimal literal', () => {
    // 2.675 is stored as 2.67499999999999982236431605997495353221893310546875
    expect(normalizeNumber(2.675)).toBe(2.67)
  })

  it('sends exact ties to the even hundredth', () => {
    expect(normalizeNumber(0.125)).toBe(0.12)
    expect(normalizeNumber(0.375)).toBe(0.38)
    expect(normalizeNumber(-0.125)).toBe(-0.12)
    expect(normalizeNumber(1.625)).toBe(1.62)
  })

  it('is idempotent', () => {
    for (const value of [0, 1.005, 22.5, 123.456, -7.891, 1e6 / 3]) {
      const once = normalizeNumber(value)
      expect(normalizeNumber(once)).toBe(once)
    }
  })

  it('never returns negative zero', () => {
    expect(Object.is(normalizeNumber(-0.001), 0)).toBe(true)
  })

  it('rejects non-finite values', () => {
    expect(() => normalizeNumber(Number.NaN)).toThrow(InvalidNumberError)
    expect(() => normalizeNumber(Number.POSITIVE_INFINITY)).toThrow(InvalidNumberError)
  })
})

describe('roundHalfEven', () => {
  it('rounds to whole numbers with ties to even', () => {
    expect(roundHalfEven(2.5, 0)).toBe(2)
    expect(roundHalfEven(3.5, 0)).toBe(4)
    expect(roundHalfEven(2.4, 0)).toBe(2)
    expect(roundHalfEven(2.6, 0)).toBe(3)
  })
})

describe('sumOf', () => {
  it('adds values and returns zero for an empty list', () => {
    expect(sumOf([1, 2, 3.5])).toBe(6.5)
    expect(sumOf([])).toBe(0)
  })
})
