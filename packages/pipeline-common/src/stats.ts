import { EmptyInputError, InvalidNumberError } from './errors'

export const sortAscending = (values: readonly number[]): number[] =>
  [...values].sort((a, b) => a - b)

/**
 * Quantile with linear interpolation between the two closest ranks
 * (type 7 in the Hyndman and Fan taxonomy).
 * @param sortedValues Values in ascending order.
 * @param q Quantile between 0 and 1.
 * @throws EmptyInputError when `sortedValues` is empty.
 */
export const quantileLinear = (sortedValues: readonly number[], q: number): number => {
  if (!Number.isFinite(q) || q < 0 || q > 1) {
    throw new InvalidNumberError(`quantile must be within [0, 1], got ${q}`, q)
  }
  const n = sortedValues.length
  if (n === 0) {
    throw new EmptyInputError('quantile')
  }
  if (n === 1) {
    return sortedValues[0]
  }

  const position = (n - 1) * q
  const lowerIndex = Math.floor(position)
  const upperIndex = Math.ceil(position)
  const lowerValue = sortedValues[lowerIndex]
  if (lowerIndex === upperIndex) {
    return lowerValue
  }
  const upperValue = sortedValues[upperIndex]
  return lowerValue + (upperValue - lowerValue) * (position - lowerIndex)
}

/**
 * Median of unsorted values; an even count averages the two middle values.
 * @throws EmptyInputError when `values` is empty.
 */
export const median = (values: readonly number[]): number => {
  if (values.length === 0) {
    throw new EmptyInputError('median')
  }
  const sorted = sortAscending(values)
  const mid = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2
  }
  return sorted[mid]
}

export const medianOr = (values: readonly number[], fallback: number): number =>
  values.length === 0 ? fallback : median(values)

/**
 * Interquartile-range fences: q1 - 1.5 * iqr and q3 + 1.5 * iqr.
 */
export const iqrBounds = (sortedValues: readonly number[]): { lower: number; upper: number } => {
  const q1 = quantileLinear(sortedValues, 0.25)
  const q3 = quantileLinear(sortedValues, 0.75)
  const iqr = q3 - q1
  return {
    lower: q1 - 1.5 * iqr,
    upper: q3 + 1.5 * iqr,
  }
}
