import { parse } from 'csv-parse/sync'
import { InvalidRecordError, isRecord, type InputRecord } from '@report-drills/pipeline-common'
import { readTextFile } from './files'

/**
 * Parses CSV text with a header row. Values come back as trimmed strings;
 * empty lines are skipped.
 */
export const parseCsvRecords = (content: string, source = 'csv'): InputRecord[] => {
  let parsed: unknown
  try {
    parsed = parse(content, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      trim: true,
    })
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    throw new InvalidRecordError(`${source}: ${message}`, { source })
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidRecordError(`${source}: expected a list of rows`, { source })
  }
  return parsed.filter(isRecord)
}

export const readCsvRecords = async (path: string): Promise<InputRecord[]> => {
  return parseCsvRecords(await readTextFile(path), path)
}
