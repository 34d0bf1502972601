import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PassThrough } from 'node:stream'
import { ParquetSchema } from '@dsnp/parquetjs'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { InputFileError } from '@report-drills/pipeline-common'
import { writeTextFile } from './files'
import { formatJsonResult, writeJsonResult } from './output'
import { readParquetRecords, writeParquetRecords } from './parquet'

describe('formatJsonResult', () => {
  it('indents with two spaces, keeps key order and ends with a newline', () => {
    expect(formatJsonResult({ summary: { total: 25 }, rows: [] })).toBe(
      '{\n  "summary": {\n    "total": 25\n  },\n  "rows": []\n}\n'
    )
  })
})

describe('writeJsonResult', () => {
  it('writes the formatted document to the stream', async () => {
    const stream = new PassThrough()
    const chunks: string[] = []
    stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')))

    await writeJsonResult({ ok: true }, stream)
    expect(chunks.join('')).toBe('{\n  "ok": true\n}\n')
  })
})

describe('file writers', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'record-io-out-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('creates parent directories for text artifacts', async () => {
    const path = join(dir, 'nested', 'report.md')
    await writeTextFile(path, '# Report\n')
    expect(await readFile(path, 'utf8')).toBe('# Report\n')
  })

  it('round-trips rows through Parquet, turning INT64 cells into numbers', async () => {
    const path = join(dir, 'out', 'rows.parquet')
    const schema = new ParquetSchema({
      product: { type: 'UTF8' },
      quantity: { type: 'INT64' },
      price: { type: 'DOUBLE' },
    })

    const written = await writeParquetRecords(path, schema, [
      { product: 'Pen', quantity: 2, price: 1.5 },
      { product: 'Notebook', quantity: 1, price: 4.25 },
    ])

    expect(written).toBe(2)
    expect(await readParquetRecords(path)).toEqual([
      { product: 'Pen', quantity: 2, price: 1.5 },
      { product: 'Notebook', quantity: 1, price: 4.25 },
    ])
  })

  it('raises InputFileError for a missing Parquet file', async () => {
    await expect(readParquetRecords(join(dir, 'missing.parquet'))).rejects.toBeInstanceOf(
      InputFileError
    )
  })
})
