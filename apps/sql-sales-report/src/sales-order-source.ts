import { querySalesOrders } from '@report-drills/record-io'
import type { InputRecord, Logger } from '@report-drills/pipeline-common'
import { buildSqlSalesReport, toSalesOrderRows, type SqlSalesReportResult } from './sql-report'

/**
 * Supplies raw `sales_orders` rows to the report.
 */
export interface SalesOrderSource {
  fetchSalesOrders(): Promise<InputRecord[]>
}

export class PostgresSalesOrderSource implements SalesOrderSource {
  private readonly databaseUrl: string

  constructor(databaseUrl: string) {
    this.databaseUrl = databaseUrl
  }

  fetchSalesOrders(): Promise<InputRecord[]> {
    return querySalesOrders(this.databaseUrl)
  }
}

/**
 * Fetches rows from the source and builds the report; intermediate batches
 * are dumped when the logger has debug enabled.
 */
export const loadSqlSalesReport = async (
  source: SalesOrderSource,
  highValueThreshold: number,
  logger?: Logger
): Promise<SqlSalesReportResult> => {
  const rows = toSalesOrderRows(await source.fetchSalesOrders())
  logger?.table('sales_orders', rows)

  const result = buildSqlSalesReport(rows, highValueThreshold)
  logger?.table('segment_sales', result.segment_sales)
  logger?.table('payment_method_sales', result.payment_method_sales)
  logger?.table('high_value_orders', result.high_value_orders)
  return result
}
