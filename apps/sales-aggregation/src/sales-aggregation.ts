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
import { aggregateSales, toSalesDetails } from './sales'

const command: CliCommand = {
  name: 'sales-aggregation',
  description: 'Aggregates a sales CSV into daily, category and top-product totals (JSON on stdout).',
  options: [
    {
      name: 'input',
      valueName: 'csv',
      required: true,
      description: 'Sales CSV with date,product,category,quantity,price',
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

  const records = await metrics.recordStageAsync('read', () => readCsvRecords(input))
  const rows = metrics.recordStage('coerce', () => toSalesDetails(records))
  logger.table('sales rows', rows)

  const result = metrics.recordStage('aggregate', () => aggregateSales(rows), () => rows.length)
  logger.table('daily_sales', result.daily_sales)
  logger.table('category_sales', result.category_sales)
  logger.table('top_products', result.top_products)

  await writeJsonResult(result)
  logger.info(`aggregated ${rows.length} sales rows from ${input}`)
  metrics.printSummary(logger)
}

runCli(command.name, main)
