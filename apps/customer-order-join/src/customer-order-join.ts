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
import { joinCustomerOrders, toCustomerRecords, toOrderRecords } from './join'

const command: CliCommand = {
  name: 'customer-order-join',
  description: 'Joins orders onto customers and reports sales per customer segment.',
  options: [
    {
      name: 'customers',
      valueName: 'csv',
      required: true,
      description: 'Customer CSV with customer_id,customer_name,segment',
    },
    {
      name: 'orders',
      valueName: 'csv',
      required: true,
      description: 'Order CSV with order_id,order_date,customer_id,product,quantity,unit_price',
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
  const customersPath = requireValue(args, 'customers')
  const ordersPath = requireValue(args, 'orders')

  const customers = toCustomerRecords(
    await metrics.recordStageAsync('read customers', () => readCsvRecords(customersPath))
  )
  const orders = toOrderRecords(
    await metrics.recordStageAsync('read orders', () => readCsvRecords(ordersPath))
  )
  logger.table('customers', customers)
  logger.table('orders', orders)

  const result = metrics.recordStage(
    'join',
    () => joinCustomerOrders(customers, orders),
    () => orders.length
  )
  logger.table('segment_sales_left', result.segment_sales_left)
  logger.table('orphan_orders', result.orphan_orders)

  if (result.summary.orphan_order_count > 0) {
    logger.warn(`${result.summary.orphan_order_count} order(s) reference unknown customers`)
  }

  await writeJsonResult(result)
  metrics.printSummary(logger)
}

runCli(command.name, main)
