import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { ParquetReader, ParquetWriter, type ParquetSchema } from '@dsnp/parquetjs'
import { InputFileError, isRecord, type InputRecord } from '@report-drills/pipeline-common'

// INT64 columns are decoded as bigint.
const toPlainCell = (value: unknown): unknown => (typeof value === 'bigint' ? Number(value) : value)

const toPlainRecord = (row: Record<string, unknown>): InputRecord =>
  Object.fromEntries(Object.entries(row).map(([key, value]) => [key, toPlainCell(value)]))

/**
 * Reads every row of a Parquet file.
 */
export const readParquetRecords = async (path: string): Promise<InputRecord[]> => {
  let reader: ParquetReader
  try {
    reader = await ParquetReader.openFile(path)
  } catch (error: unknown) {
    throw new InputFileError(path, error)
  }

  const records: InputRecord[] = []
  try {
    const cursor = reader.getCursor()
    let row: unknown = await cursor.next()
    while (isRecord(row)) {
      records.push(toPlainRecord(row))
      row = await cursor.next()
    }
  } finally {
    await reader.close()
  }
  return records
}

/**
 * Writes rows to a new Parquet file, replacing any existing one.
 */
export const writeParquetRecords = async (
  path: string,
  schema: ParquetSchema,
  rows: readonly Record<string, unknown>[]
): Promise<number> => {
  await mkdir(dirname(path), { recursive: true })
  const writer = await ParquetWriter.openFile(schema, path)
  try {
    for (const row of rows) {
      await writer.appendRow(row)
    }
  } finally {
    await writer.close()
  }
  return rows.length
}
