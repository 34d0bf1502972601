/**
 * Error hierarchy shared by every report.
 *
 * Fatal input problems are thrown as one of these classes and abort the run.
 * Per-record problems (an unparseable timestamp, a blank field) are never
 * thrown: the aggregators drop or fill those records and count them.
 */
export class AnalyticsError extends Error {
  public readonly code: string
  public readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.context = context
    Error.captureStackTrace(this, this.constructor)
  }
}

export class EmptyInputError extends AnalyticsError {
  constructor(operation: string) {
    super(`${operation} requires at least one value`, 'EMPTY_INPUT', { operation })
  }
}

export class EmptyDatasetError extends AnalyticsError {
  constructor(dataset: string) {
    super(`${dataset} contains no rows`, 'EMPTY_DATASET', { dataset })
  }
}

export class NoValidResponseTimesError extends AnalyticsError {
  constructor(recordCount: number) {
    super(
      `no record has a valid response_time_ms (records after timestamp parsing: ${recordCount})`,
      'NO_VALID_RESPONSE_TIMES',
      { recordCount }
    )
  }
}

export class NoDataError extends AnalyticsError {
  constructor(source: string) {
    super(`${source} returned no rows; load the seed data first`, 'NO_DATA', { source })
  }
}

export class InvalidNumberError extends AnalyticsError {
  constructor(message: string, value: unknown) {
    super(message, 'INVALID_NUMBER', { value })
  }
}

export class InvalidRecordError extends AnalyticsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_RECORD', context)
  }
}

export class InputFileError extends AnalyticsError {
  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`cannot read input file ${path}: ${reason}`, 'INPUT_FILE', { path })
  }
}

export class ConfigError extends AnalyticsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG', context)
  }
}

export const isAnalyticsError = (error: unknown): error is AnalyticsError =>
  error instanceof AnalyticsError
