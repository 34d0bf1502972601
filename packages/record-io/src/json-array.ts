import { InvalidRecordError, isRecord, type InputRecord } from '@report-drills/pipeline-common'
import { readTextFile } from './files'

/**
 * Parses a JSON document holding an array of objects.
 */
export const parseJsonArrayRecords = (content: string, source = 'json'): InputRecord[] => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    throw new InvalidRecordError(`${source}: invalid JSON: ${message}`, { source })
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidRecordError(`${source}: expected a JSON array`, { source })
  }

  return parsed.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new InvalidRecordError(`${source}[${index}]: expected a JSON object`, { source, index })
    }
    return item
  })
}

export const readJsonArrayRecords = async (path: string): Promise<InputRecord[]> => {
  return parseJsonArrayRecords(await readTextFile(path), path)
}
