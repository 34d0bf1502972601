import {
  coerceInstant,
  coerceNumber,
  coerceText,
  formatUtcSecond,
  iqrBounds,
  median,
  normalizeNumber,
  NoValidResponseTimesError,
  sortAscending,
  type Coerced,
  type InputRecord,
} from '@report-drills/pipeline-common'

export const UNKNOWN_ENDPOINT = '/unknown'
export const UNKNOWN_METHOD = 'UNKNOWN'
/** Filled status; never checked against the valid HTTP range. */
export const MISSING_STATUS = 0

export interface CleanedLog {
  timestamp: string
  endpoint: string
  method: string
  status: number
  response_time_ms: number
  is_anomaly: boolean
  is_outlier: boolean
}

export interface LogSummary {
  total_records: number
  filled_response_time_count: number
  filled_status_count: number
  filled_endpoint_count: number
  filled_method_count: number
  anomaly_count: number
  outlier_count: number
}

export interface ResponseTimeBounds {
  lower: number
  upper: number
}

export interface LogPreprocessResult {
  summary: LogSummary
  response_time_bounds: ResponseTimeBounds
  cleaned_logs: CleanedLog[]
  anomalies: CleanedLog[]
  outliers: CleanedLog[]
}

/**
 * A cleaned batch plus the number of input records dropped for an
 * unparseable timestamp.
 */
export interface LogBatch {
  result: LogPreprocessResult
  droppedTimestampCount: number
}

interface ParsedLog {
  instant: Date
  endpoint: string | undefined
  method: string | undefined
  status: number | undefined
  responseTimeMs: number | undefined
}

interface FilledLog {
  instant: Date
  endpoint: string
  method: string
  status: number
  responseTimeMs: number
}

const optional = <T>(result: Coerced<T>): T | undefined =>
  result.ok ? result.value : undefined

const parseLog = (record: InputRecord): ParsedLog | undefined => {
  const instant = coerceInstant(record.timestamp)
  if (!instant.ok) {
    return undefined
  }
  return {
    instant: instant.value,
    endpoint: optional(coerceText(record.endpoint)),
    method: optional(coerceText(record.method)),
    status: optional(coerceNumber(record.status)),
    responseTimeMs: optional(coerceNumber(record.response_time_ms)),
  }
}

const isAnomaly = (log: FilledLog): boolean =>
  log.responseTimeMs < 0 ||
  (log.status !== MISSING_STATUS && (log.status < 100 || log.status > 599))

/**
 * Cleans a batch of access-log records and flags anomalies and IQR outliers.
 *
 * Records with an unparseable timestamp are dropped and counted. Missing
 * fields are filled (response time with the batch median) and counted.
 * @throws NoValidResponseTimesError When no remaining record has a response time.
 */
export const cleanLogBatch = (records: readonly InputRecord[]): LogBatch => {
  const parsed: ParsedLog[] = []
  let droppedTimestampCount = 0
  for (const record of records) {
    const log = parseLog(record)
    if (log) {
      parsed.push(log)
    } else {
      droppedTimestampCount += 1
    }
  }

  const presentTimes = parsed.flatMap((log) =>
    log.responseTimeMs === undefined ? [] : [log.responseTimeMs]
  )
  if (presentTimes.length === 0) {
    throw new NoValidResponseTimesError(parsed.length)
  }
  const medianResponseTime = median(presentTimes)

  let filledResponseTime = 0
  let filledStatus = 0
  let filledEndpoint = 0
  let filledMethod = 0

  const filled: FilledLog[] = parsed.map((log) => {
    if (log.responseTimeMs === undefined) filledResponseTime += 1
    if (log.status === undefined) filledStatus += 1
    if (log.endpoint === undefined) filledEndpoint += 1
    if (log.method === undefined) filledMethod += 1

    return {
      instant: log.instant,
      endpoint: log.endpoint ?? UNKNOWN_ENDPOINT,
      method: log.method ?? UNKNOWN_METHOD,
      status: log.status ?? MISSING_STATUS,
      responseTimeMs: log.responseTimeMs ?? medianResponseTime,
    }
  })

  const bounds = iqrBounds(sortAscending(filled.map((log) => log.responseTimeMs)))

  const cleaned_logs: CleanedLog[] = [...filled]
    .sort((a, b) => a.instant.getTime() - b.instant.getTime())
    .map((log) => ({
      timestamp: formatUtcSecond(log.instant),
      endpoint: log.endpoint,
      method: log.method,
      status: Math.trunc(log.status),
      response_time_ms: normalizeNumber(log.responseTimeMs),
      is_anomaly: isAnomaly(log),
      is_outlier: log.responseTimeMs < bounds.lower || log.responseTimeMs > bounds.upper,
    }))

  const anomalies = cleaned_logs.filter((log) => log.is_anomaly)
  const outliers = cleaned_logs.filter((log) => log.is_outlier)

  const result: LogPreprocessResult = {
    summary: {
      total_records: cleaned_logs.length,
      filled_response_time_count: filledResponseTime,
      filled_status_count: filledStatus,
      filled_endpoint_count: filledEndpoint,
      filled_method_count: filledMethod,
      anomaly_count: anomalies.length,
      outlier_count: outliers.length,
    },
    response_time_bounds: {
      lower: normalizeNumber(bounds.lower),
      upper: normalizeNumber(bounds.upper),
    },
    cleaned_logs,
    anomalies,
    outliers,
  }
  return { result, droppedTimestampCount }
}

export const preprocessLogs = (records: readonly InputRecord[]): LogPreprocessResult =>
  cleanLogBatch(records).result
