/* eslint-disable no-console */
import pc from 'picocolors'

export interface Logger {
  readonly debugEnabled: boolean
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  /** Dumps a batch of records as an aligned text table at debug level. */
  table: (label: string, rows: readonly object[]) => void
}

export interface LoggerOptions {
  debug?: boolean
  /** Receives every formatted line; defaults to stderr so stdout stays pure JSON. */
  sink?: (line: string) => void
}

const formatCell = (value: unknown): string => {
  if (value === null || value === undefined) {
    return 'null'
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

/**
 * Renders records as a plain-text table with one column per key, in first-seen order.
 */
export const formatTable = (rows: readonly object[]): string => {
  if (rows.length === 0) {
    return '(empty)'
  }

  const columns: string[] = []
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) {
        columns.push(key)
      }
    }
  }

  const cells = rows.map((row) => {
    const entries = new Map<string, unknown>(Object.entries(row))
    return columns.map((column) => formatCell(entries.get(column)))
  })
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index].length))
  )

  const renderLine = (values: string[]): string =>
    values
      .map((value, index) => value.padStart(widths[index]))
      .join('  ')
      .trimEnd()

  return [renderLine(columns), ...cells.map(renderLine)].join('\n')
}

export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
  const debugEnabled = options.debug ?? false
  const sink = options.sink ?? ((line: string) => console.error(line))
  const prefix = pc.cyan(`[${scope}]`)

  const emit = (level: string, message: string): void => {
    sink(`${prefix} ${level} ${message}`)
  }

  return {
    debugEnabled,
    debug: (message) => {
      if (debugEnabled) {
        emit(pc.gray('DEBUG'), message)
      }
    },
    info: (message) => emit(pc.green('INFO'), message),
    warn: (message) => emit(pc.yellow('WARN'), message),
    error: (message) => emit(pc.red('ERROR'), message),
    table: (label, rows) => {
      if (debugEnabled) {
        emit(pc.gray('DEBUG'), `--- ${label} ---\n${formatTable(rows)}`)
      }
    },
  }
}
