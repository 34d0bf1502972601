import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { InputRecord } from '@report-drills/pipeline-common'
import { readParquetRecords } from '@report-drills/record-io'
import { ParquetCleanOrderWriter } from './clean-order-writer'
import {
  runEtl,
  transformOrders,
  type CleanOrder,
  type CleanOrderWriter,
  type LoadStats,
} from './etl'

const buildRaw = (overrides: InputRecord = {}): InputRecord => ({
  order_id: 'E1',
  order_date: '2024-02-01',
  customer_id: 'K1',
  product: 'Pen',
  quantity: '1',
  unit_price: '1',
  ...overrides,
})

const sampleRaw = (): InputRecord[] => [
  buildRaw({ order_id: ' E3 ', order_date: '2024-02-10', quantity: '2', unit_price: '1.25' }),
  buildRaw({
    order_date: '2024/02/01',
    customer_id: '',
    product: 'Desk',
    quantity: 'abc',
    unit_price: '100',
  }),
  buildRaw({ order_id: 'E2', order_date: 'not a date' }),
  buildRaw({ order_id: 'E4', customer_id: 'K2', product: 'Lamp', quantity: '3', unit_price: '-5' }),
  buildRaw({
    order_id: 'E5',
    order_date: '2024-03-05',
    customer_id: 'K3',
    product: 'Ink',
    quantity: '0',
    unit_price: '',
  }),
]

class RecordingWriter implements CleanOrderWriter {
  written: CleanOrder[] = []

  write(outputPath: string, rows: readonly CleanOrder[]): Promise<LoadStats> {
    this.written = [...rows]
    return Promise.resolve({ output_path: outputPath, loaded_records: rows.length })
  }
}

describe('transformOrders', () => {
  it('drops order dates that do not exist and treats hex quantities as invalid', () => {
    const { rows, stats } = transformOrders([
      buildRaw({ order_id: 'D1', order_date: '2026-02-30 10:00' }),
      buildRaw({ order_id: 'D2', order_date: 'foo 2026' }),
      buildRaw({ order_id: 'D3', order_date: '2026-03-01T10:00:00Z', quantity: '0x2' }),
    ])

    expect(stats.dropped_invalid_order_date_count).toBe(2)
    expect(stats.filled_quantity_count).toBe(1)
    expect(rows).toEqual([
      {
        order_id: 'D3',
        order_date: '2026-03-01',
        customer_id: 'K1',
        product: 'Pen',
        quantity: 1,
        unit_price: 1,
        order_month: '2026-03',
        line_total: 1,
      },
    ])
  })

  it('drops undated rows and fills the rest from the medians of valid values', () => {
    const { rows, stats } = transformOrders(sampleRaw())

    // quantities > 0: [2, 3]; prices >= 0: [1.25, 100]
    expect(stats).toEqual({
      transformed_records: 4,
      dropped_invalid_order_date_count: 1,
      filled_customer_id_count: 1,
      filled_quantity_count: 2,
      filled_unit_price_count: 2,
      quantity_fill_value: 2.5,
      unit_price_fill_value: 50.62,
    })
    expect(rows.map((row) => row.order_id)).toEqual(['E1', 'E4', 'E3', 'E5'])
  })

  it('rounds filled quantities to whole units, ties to even', () => {
    const { rows } = transformOrders(sampleRaw())
    expect(rows[0]).toEqual({
      order_id: 'E1',
      order_date: '2024-02-01',
      customer_id: 'UNKNOWN_CUSTOMER',
      product: 'Desk',
      quantity: 2,
      unit_price: 100,
      order_month: '2024-02',
      line_total: 200,
    })
    // 3 x 50.625 = 151.875, an exact tie
    expect(rows[1]).toMatchObject({ quantity: 3, unit_price: 50.625, line_total: 151.88 })
    expect(rows[3]).toMatchObject({ quantity: 2, unit_price: 50.625, line_total: 101.25 })
  })

  it('falls back to 1 and 0 when no valid quantity or price remains', () => {
    const { rows, stats } = transformOrders([buildRaw({ quantity: '-1', unit_price: 'x' })])
    expect(stats.quantity_fill_value).toBe(1)
    expect(stats.unit_price_fill_value).toBe(0)
    expect(rows[0]).toMatchObject({ quantity: 1, unit_price: 0, line_total: 0 })
  })
})

describe('runEtl', () => {
  it('reports each stage and samples the first cleaned rows', async () => {
    const writer = new RecordingWriter()
    const result = await runEtl(sampleRaw(), writer, 'out/clean_orders.parquet')

    expect(writer.written).toHaveLength(4)
    expect(result.summary.extract).toEqual({ input_records: 5 })
    expect(result.summary.load).toEqual({
      output_path: 'out/clean_orders.parquet',
      loaded_records: 4,
    })
    expect(result.summary.total_sales).toBe(455.63)
    expect(result.sample_cleaned_rows.map((row) => row.order_id)).toEqual(['E1', 'E4', 'E3'])
    expect(result.sample_cleaned_rows[1].unit_price).toBe(50.62)
    expect(result.sample_cleaned_rows[2]).toEqual({
      order_id: 'E3',
      order_date: '2024-02-10',
      customer_id: 'K1',
      product: 'Pen',
      quantity: 2,
      unit_price: 1.25,
      order_month: '2024-02',
      line_total: 2.5,
    })
  })

  it('handles an empty extract', async () => {
    const result = await runEtl([], new RecordingWriter(), 'empty.parquet')
    expect(result.summary.transform.transformed_records).toBe(0)
    expect(result.summary.total_sales).toBe(0)
    expect(result.sample_cleaned_rows).toEqual([])
  })
})

describe('ParquetCleanOrderWriter', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'etl-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes the cleaned rows to Parquet', async () => {
    const path = join(dir, 'out', 'clean_orders.parquet')
    const { rows } = transformOrders([buildRaw({ quantity: '2', unit_price: '2.5' })])

    const stats = await new ParquetCleanOrderWriter().write(path, rows)

    expect(stats).toEqual({ output_path: path, loaded_records: 1 })
    expect(await readParquetRecords(path)).toEqual([
      {
        order_id: 'E1',
        order_date: '2024-02-01',
        customer_id: 'K1',
        product: 'Pen',
        quantity: 2,
        unit_price: 2.5,
        order_month: '2024-02',
        line_total: 5,
      },
    ])
  })
})
