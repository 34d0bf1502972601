import { InvalidNumberError } from './errors'

// Enough extra digits to tell an exact tie from a value one ulp away from it.
const TIE_PROBE_DIGITS = 25

// toFixed switches to exponent notation from here on; such values are integers anyway.
const FIXED_NOTATION_LIMIT = 1e21

const isExactTie = (expanded: string, digits: number): boolean => {
  const fraction = expanded.split('.')[1] ?? ''
  const tail = fraction.slice(digits)
  return tail.startsWith('5') && /^0*$/.test(tail.slice(1))
}

const lastDigitIsEven = (truncated: string): boolean => {
  const digits = truncated.replace('.', '')
  const last = Number(digits[digits.length - 1] ?? '0')
  return last % 2 === 0
}

/**
 * Rounds the exact binary value of `value` to `digits` decimal places.
 * Values exactly halfway between two candidates go to the even one.
 */
export const roundHalfEven = (value: number, digits: number): number => {
  if (!Number.isFinite(value)) {
    throw new InvalidNumberError(`cannot round non-finite value ${value}`, value)
  }
  if (!Number.isInteger(digits) || digits < 0 || digits > 20) {
    throw new InvalidNumberError(`unsupported number of decimal places: ${digits}`, digits)
  }

  const magnitude = Math.abs(value)
  if (magnitude >= FIXED_NOTATION_LIMIT) {
    return value
  }

  const expanded = magnitude.toFixed(digits + TIE_PROBE_DIGITS)
  let rounded: number
  if (isExactTie(expanded, digits)) {
    const pointIndex = expanded.indexOf('.')
    const truncated = expanded.slice(0, digits === 0 ? pointIndex : pointIndex + 1 + digits)
    // toFixed resolves ties upwards, which is the right answer only for an odd last digit.
    rounded = lastDigitIsEven(truncated) ? Number(truncated) : Number(magnitude.toFixed(digits))
  } else {
    rounded = Number(magnitude.toFixed(digits))
  }

  if (rounded === 0) {
    return 0
  }
  return value < 0 ? -rounded : rounded
}

/**
 * Normalizes a money-like value for report output: two decimal places, and
 * whole numbers stay whole so they serialize as `25`, not `25.0`.
 */
export const normalizeNumber = (value: number): number => roundHalfEven(value, 2)

export const sumOf = (values: readonly number[]): number =>
  values.reduce((total, value) => total + value, 0)
