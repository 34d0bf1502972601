import { ParquetSchema } from '@dsnp/parquetjs'
import { writeParquetRecords } from '@report-drills/record-io'
import type { CleanOrder, CleanOrderWriter, LoadStats } from './etl'

export const CLEAN_ORDER_SCHEMA = new ParquetSchema({
  order_id: { type: 'UTF8' },
  order_date: { type: 'UTF8' },
  customer_id: { type: 'UTF8' },
  product: { type: 'UTF8' },
  quantity: { type: 'INT64' },
  unit_price: { type: 'DOUBLE' },
  order_month: { type: 'UTF8' },
  line_total: { type: 'DOUBLE' },
})

/**
 * Writes cleaned orders to a Parquet file, replacing any previous output.
 */
export class ParquetCleanOrderWriter implements CleanOrderWriter {
  async write(outputPath: string, rows: readonly CleanOrder[]): Promise<LoadStats> {
    const loaded = await writeParquetRecords(
      outputPath,
      CLEAN_ORDER_SCHEMA,
      rows.map((row) => ({ ...row }))
    )
    return { output_path: outputPath, loaded_records: loaded }
  }
}
