import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { InputFileError } from '@report-drills/pipeline-common'

/**
 * Reads a UTF-8 input file.
 * @throws InputFileError When the file is missing or unreadable.
 */
export const readTextFile = async (path: string): Promise<string> => {
  try {
    return await readFile(path, 'utf8')
  } catch (error: unknown) {
    throw new InputFileError(path, error)
  }
}

/**
 * Writes a text artifact, creating parent directories as needed.
 */
export const writeTextFile = async (path: string, contents: string): Promise<void> => {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, contents, 'utf8')
}
