/* eslint-disable no-console */
import {
  COMMON_OPTIONS,
  createLogger,
  formatUsage,
  loadReportConfig,
  MetricsCollector,
  parseCliArgs,
  requireValue,
  runCli,
  type CliCommand,
} from '@report-drills/pipeline-common'
import { readJsonArrayRecords, readParquetRecords, writeJsonResult } from '@report-drills/record-io'
import { toSalesDetails } from '../../sales-aggregation/src/sales'
import { compareFormats } from './compare'

const command: CliCommand = {
  name: 'data-format-compare',
  description: 'Aggregates the same sales data from JSON and Parquet and reports any differences.',
  options: [
    {
      name: 'json-input',
      valueName: 'json',
      required: true,
      description: 'JSON array of sales rows',
    },
    {
      name: 'parquet-input',
      valueName: 'parquet',
      required: true,
      description: 'Parquet file with the same sales rows',
    },
    ...COMMON_OPTIONS,
  ],
}

const main = async (): Promise<void> => {
  const args = parseCliArgs(process.argv.slice(2), command)
  if (args.help) {
    console.log(formatUsage(command))
    return
  }

  const config = loadReportConfig({ configPath: args.values.get('config') })
  const logger = createLogger(command.name, { debug: config.debug || args.switches.has('debug') })
  const metrics = new MetricsCollector(command.name)
  const jsonInput = requireValue(args, 'json-input')
  const parquetInput = requireValue(args, 'parquet-input')

  const jsonRows = toSalesDetails(
    await metrics.recordStageAsync('read json', () => readJsonArrayRecords(jsonInput))
  )
  const parquetRows = toSalesDetails(
    await metrics.recordStageAsync('read parquet', () => readParquetRecords(parquetInput))
  )
  logger.table('json rows', jsonRows)
  logger.table('parquet rows', parquetRows)

  const result = metrics.recordStage(
    'compare',
    () => compareFormats(jsonRows, parquetRows),
    () => jsonRows.length + parquetRows.length
  )

  await writeJsonResult(result)
  if (!result.summary.is_equivalent) {
    logger.warn('JSON and Parquet aggregations differ')
  }
  metrics.printSummary(logger)
}

runCli(command.name, main)
