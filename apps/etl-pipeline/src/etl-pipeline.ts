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
import { readCsvRecords, writeJsonResult } from '@report-drills/record-io'
import { ParquetCleanOrderWriter } from './clean-order-writer'
import { runEtl, type CleanOrder, type CleanOrderWriter, type LoadStats } from './etl'

const command: CliCommand = {
  name: 'etl-pipeline',
  description: 'Cleans an orders CSV, writes it to Parquet and reports each ETL stage.',
  options: [
    {
      name: 'input',
      valueName: 'csv',
      required: true,
      description: 'Orders CSV with order_id,order_date,customer_id,product,quantity,unit_price',
    },
    {
      name: 'output',
      valueName: 'parquet',
      required: true,
      description: 'Parquet file to write the cleaned orders to',
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
  const output = requireValue(args, 'output')

  const rawRows = await metrics.recordStageAsync('extract', () => readCsvRecords(input))
  logger.table('raw orders', rawRows)

  const parquetWriter = new ParquetCleanOrderWriter()
  const writer: CleanOrderWriter = {
    write: (outputPath: string, rows: readonly CleanOrder[]): Promise<LoadStats> => {
      logger.table('cleaned orders', rows)
      return metrics.recordStageAsync(
        'load',
        () => parquetWriter.write(outputPath, rows),
        (stats) => stats.loaded_records
      )
    },
  }

  const result = await runEtl(rawRows, writer, output)

  await writeJsonResult(result)
  logger.info(`loaded ${result.summary.load.loaded_records} orders into ${output}`)
  metrics.printSummary(logger)
}

runCli(command.name, main)
