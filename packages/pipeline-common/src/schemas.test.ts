import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { InvalidRecordError } from './errors'
import { calendarDateField, numberField, parseRecords, textField } from './schemas'

const rowSchema = z.object({
  name: textField,
  amount: numberField,
  day: calendarDateField,
})

describe('parseRecords', () => {
  it('coerces every field of every row', () => {
    expect(
      parseRecords(rowSchema, [
        { name: 'Tea', amount: ' 2.5 ', day: '2026/3/4', extra: true },
        { name: 7, amount: 3n, day: '2026-03-05T08:00:00Z' },
      ])
    ).toEqual([
      { name: 'Tea', amount: 2.5, day: '2026-03-04' },
      { name: '7', amount: 3, day: '2026-03-05' },
    ])
  })

  it('reports the first failing field with the row index and source', () => {
    const rows = [
      { name: 'Tea', amount: 1, day: '2026-03-04' },
      { name: 'Tea', amount: '0x10', day: '2026-02-30' },
    ]
    expect(() => parseRecords(rowSchema, rows, 'orders')).toThrow(InvalidRecordError)
    expect(() => parseRecords(rowSchema, rows, 'orders')).toThrow(
      'orders row 1: amount is not numeric'
    )
  })

  it('distinguishes missing values from invalid ones', () => {
    expect(() => parseRecords(rowSchema, [{ name: 'Tea', amount: 1 }])).toThrow(
      'row 0: day is missing'
    )
    expect(() => parseRecords(rowSchema, [{ name: 'Tea', amount: 1, day: 'soon' }])).toThrow(
      'row 0: day is not a date'
    )
  })
})
