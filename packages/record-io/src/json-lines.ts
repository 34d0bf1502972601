import { open, type FileHandle } from 'node:fs/promises'
import { createInterface } from 'node:readline'
import {
  InputFileError,
  InvalidRecordError,
  isRecord,
  type InputRecord,
} from '@report-drills/pipeline-common'

/**
 * Parses one JSON Lines entry. Returns undefined for blank lines.
 * @throws InvalidRecordError When the line is malformed or not a JSON object.
 */
export const parseJsonLine = (
  line: string,
  lineNumber: number,
  source = 'jsonl'
): InputRecord | undefined => {
  if (line.trim() === '') {
    return undefined
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    throw new InvalidRecordError(`${source}:${lineNumber}: invalid JSON: ${message}`, {
      source,
      line: lineNumber,
    })
  }

  if (!isRecord(parsed)) {
    throw new InvalidRecordError(`${source}:${lineNumber}: expected a JSON object`, {
      source,
      line: lineNumber,
    })
  }
  return parsed
}

/**
 * Reads a JSON Lines file line by line into memory.
 */
export const readJsonLinesRecords = async (path: string): Promise<InputRecord[]> => {
  let handle: FileHandle
  try {
    handle = await open(path, 'r')
  } catch (error: unknown) {
    throw new InputFileError(path, error)
  }

  const reader = createInterface({
    input: handle.createReadStream({ encoding: 'utf8' }),
    crlfDelay: Infinity,
  })
  const records: InputRecord[] = []
  let lineNumber = 0
  try {
    for await (const line of reader) {
      lineNumber += 1
      const record = parseJsonLine(line, lineNumber, path)
      if (record) {
        records.push(record)
      }
    }
  } finally {
    reader.close()
    await handle.close()
  }
  return records
}
