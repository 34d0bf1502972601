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
import { readJsonLinesRecords, writeJsonResult } from '@report-drills/record-io'
import { cleanLogBatch } from './logs'

const command: CliCommand = {
  name: 'log-preprocessing',
  description: 'Cleans JSON Lines access logs and flags anomalies and response-time outliers.',
  options: [
    {
      name: 'input',
      valueName: 'jsonl',
      required: true,
      description: 'Log file with timestamp,endpoint,method,status,response_time_ms',
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
  const input = requireValue(args, 'input')

  const records = await metrics.recordStageAsync('read', () => readJsonLinesRecords(input))
  logger.table('raw logs', records)

  const { result, droppedTimestampCount } = metrics.recordStage(
    'clean',
    () => cleanLogBatch(records),
    (batch) => batch.result.cleaned_logs.length
  )
  logger.table('cleaned logs', result.cleaned_logs)

  if (droppedTimestampCount > 0) {
    logger.warn(`dropped ${droppedTimestampCount} record(s) with an unparseable timestamp`)
  }

  await writeJsonResult(result)
  logger.info(
    `cleaned ${result.summary.total_records} records: ${result.summary.anomaly_count} anomalies, ${result.summary.outlier_count} outliers`
  )
  metrics.printSummary(logger)
}

runCli(command.name, main)
