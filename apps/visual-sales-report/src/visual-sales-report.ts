/* eslint-disable no-console */
import { join } from 'node:path'
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
import { readCsvRecords, writeJsonResult, writeTextFile } from '@report-drills/record-io'
import { toSalesDetails } from '../../sales-aggregation/src/sales'
import { renderBarChartSvg, renderLineChartSvg } from './charts'
import { renderDecisionReport } from './decision-report'
import { buildVisualSalesReport, type VisualSalesReport } from './visual-report'

const command: CliCommand = {
  name: 'visual-sales-report',
  description: 'Aggregates a sales CSV and writes SVG charts plus a Markdown decision report.',
  options: [
    {
      name: 'input',
      valueName: 'csv',
      required: true,
      description: 'Sales CSV with date,product,category,quantity,price',
    },
    {
      name: 'output-dir',
      valueName: 'dir',
      description: 'Directory for charts and report (default: output/visual-sales-report)',
    },
    ...COMMON_OPTIONS,
  ],
}

const renderArtifacts = (report: VisualSalesReport): Array<[string, string]> => [
  [
    report.artifacts.daily_sales_chart,
    renderLineChartSvg({
      title: 'Daily Sales Trend',
      xLabel: 'Date',
      yLabel: 'Sales',
      points: report.daily_sales.map((item) => ({ label: item.date, value: item.sales })),
    }),
  ],
  [
    report.artifacts.category_sales_chart,
    renderBarChartSvg({
      title: 'Category Sales',
      xLabel: 'Category',
      yLabel: 'Sales',
      points: report.category_sales.map((item) => ({ label: item.category, value: item.sales })),
    }),
  ],
  [
    report.artifacts.top_products_chart,
    renderBarChartSvg({
      title: 'Top Products by Sales',
      xLabel: 'Sales',
      yLabel: 'Product',
      orientation: 'horizontal',
      points: report.top_products.map((item) => ({ label: item.product, value: item.sales })),
    }),
  ],
  [report.artifacts.decision_report_markdown, renderDecisionReport(report)],
]

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
  const outputDir = args.values.get('output-dir') ?? config.outputDir

  const records = await metrics.recordStageAsync('read', () => readCsvRecords(input))
  const rows = toSalesDetails(records)
  logger.table('sales rows', rows)

  const report = metrics.recordStage(
    'aggregate',
    () => buildVisualSalesReport(rows),
    () => rows.length
  )

  const artifacts = renderArtifacts(report)
  await metrics.recordStageAsync('write artifacts', async () => {
    for (const [fileName, contents] of artifacts) {
      await writeTextFile(join(outputDir, fileName), contents)
    }
    return artifacts
  })

  await writeJsonResult(report)
  logger.info(`wrote ${artifacts.length} artifacts to ${outputDir}`)
  metrics.printSummary(logger)
}

runCli(command.name, main)
