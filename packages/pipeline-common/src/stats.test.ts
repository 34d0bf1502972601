import { describe, expect, it } from 'vitest'
import { EmptyInputError, InvalidNumberError } from './errors'
import { iqrBounds, median, medianOr, quantileLinear } from './stats'

describe('quantileLinear', () => {
  it('returns the only element for any quantile', () => {
    expect(quantileLinear([42], 0)).toBe(42)
    expect(quantileLinear([42], 0.25)).toBe(42)
    expect(quantileLinear([42], 1)).toBe(42)
  })

  it('interpolates between neighbouring ranks', () => {
    expect(quantileLinear([1, 2, 3, 4], 0.25)).toBe(1.75)
    expect(quantileLinear([1, 2, 3, 4], 0.75)).toBe(3.25)
    expect(quantileLinear([1, 2, 3, 4], 0.5)).toBe(2.5)
  })

  it('returns an exact rank when the position is whole', () => {
    expect(quantileLinear([10, 20, 30, 40, 50], 0.25)).toBe(20)
    expect(quantileLinear([10, 20, 30, 40, 50], 1)).toBe(50)
  })

  it('fails on empty input', () => {
    expect(() => quantileLinear([], 0.5)).toThrow(EmptyInputError)
  })

  it('rejects quantiles outside [0, 1]', () => {
    expect(() => quantileLinear([1, 2], 1.5)).toThrow(InvalidNumberError)
  })
})

describe('median', () => {
  it('takes the middle value of an odd count', () => {
    expect(median([30, 10, 20])).toBe(20)
  })

  it('averages the two middle values of an even count', () => {
    expect(median([40, 10, 30, 20])).toBe(25)
  })

  it('does not reorder the caller array', () => {
    const values = [3, 1, 2]
    median(values)
    expect(values).toEqual([3, 1, 2])
  })

  it('fails on empty input unless a fallback is given', () => {
    expect(() => median([])).toThrow(EmptyInputError)
    expect(medianOr([], 1)).toBe(1)
    expect(medianOr([4, 6], 1)).toBe(5)
  })
})

describe('iqrBounds', () => {
  it('places the fences 1.5 IQR outside the quartiles', () => {
    // q1 = 1.75, q3 = 3.25, iqr = 1.5
    expect(iqrBounds([1, 2, 3, 4])).toEqual({ lower: -0.5, upper: 5.5 })
  })
})
