import { z } from 'zod'
import { coerceCalendarDate, coerceNumber, coerceText, type Coerced } from './coerce'
import { InvalidRecordError } from './errors'
import type { InputRecord } from './types'

const isBlank = (raw: unknown): boolean =>
  raw === null || raw === undefined || (typeof raw === 'string' && raw.trim() === '')

/**
 * Wraps a field coercion as a zod schema. Blank values are reported as
 * missing, anything else the coercion rejects with `invalidMessage`.
 */
const coercedField = <T>(coerce: (raw: unknown) => Coerced<T>, invalidMessage: string) =>
  z.unknown().transform((raw, ctx): T => {
    const result = coerce(raw)
    if (result.ok) {
      return result.value
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: isBlank(raw) ? 'is missing' : invalidMessage,
    })
    return z.NEVER
  })

export const textField = coercedField(coerceText, 'is missing')

export const numberField = coercedField(coerceNumber, 'is not numeric')

export const calendarDateField = coercedField(coerceCalendarDate, 'is not a date')

/**
 * Validates loose rows against a record schema.
 * @param source Prefix for error messages, e.g. "orders".
 * @throws InvalidRecordError Naming the row index and the first failing field.
 */
export const parseRecords = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  records: readonly InputRecord[],
  source?: string
): T[] =>
  records.map((record, index) => {
    const parsed = schema.safeParse(record)
    if (parsed.success) {
      return parsed.data
    }
    const [issue] = parsed.error.issues
    const field = issue.path.join('.')
    const prefix = source === undefined ? '' : `${source} `
    throw new InvalidRecordError(`${prefix}row ${index}: ${field} ${issue.message}`, {
      source,
      index,
      field,
      value: record[field],
    })
  })
