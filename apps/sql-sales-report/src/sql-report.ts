import { z } from 'zod'
import {
  byNumberDesc,
  byTextAsc,
  calendarDateField,
  compareText,
  composeComparators,
  NoDataError,
  normalizeNumber,
  numberField,
  parseRecords,
  sumOf,
  textField,
  type InputRecord,
} from '@report-drills/pipeline-common'

export interface SalesOrderRow {
  order_id: string
  /** YYYY-MM-DD */
  order_date: string
  customer_segment: string
  payment_method: string
  order_amount: number
}

export interface DailySales {
  date: string
  sales: number
}

export interface SegmentSales {
  segment: string
  total_sales: number
  order_count: number
  avg_order_amount: number
}

export interface PaymentMethodSales {
  payment_method: string
  total_sales: number
  order_count: number
  avg_order_amount: number
}

export interface HighValueOrder {
  order_id: string
  order_date: string
  segment: string
  payment_method: string
  order_amount: number
}

export interface SqlReportSummary {
  total_rows: number
  date_range_start: string
  date_range_end: string
  total_revenue: number
  high_value_order_count: number
}

export interface SqlSalesReportResult {
  summary: SqlReportSummary
  daily_sales: DailySales[]
  segment_sales: SegmentSales[]
  payment_method_sales: PaymentMethodSales[]
  high_value_orders: HighValueOrder[]
}

export const SALES_ORDERS_SOURCE = 'sales_orders'

interface Bucket {
  totalSales: number
  orderCount: number
}

const accumulate = (rows: readonly SalesOrderRow[], key: (row: SalesOrderRow) => string) => {
  const buckets = new Map<string, Bucket>()
  for (const row of rows) {
    const name = key(row)
    const bucket = buckets.get(name) ?? { totalSales: 0, orderCount: 0 }
    bucket.totalSales += row.order_amount
    bucket.orderCount += 1
    buckets.set(name, bucket)
  }
  return buckets
}

const summarize = (bucket: Bucket) => ({
  total_sales: normalizeNumber(bucket.totalSales),
  order_count: bucket.orderCount,
  avg_order_amount: normalizeNumber(bucket.totalSales / bucket.orderCount),
})

/**
 * Re-aggregates sales order rows by day, customer segment and payment method
 * and lists orders at or above the high-value threshold.
 * @throws NoDataError When there are no rows.
 */
export const buildSqlSalesReport = (
  rows: readonly SalesOrderRow[],
  highValueThreshold: number
): SqlSalesReportResult => {
  if (rows.length === 0) {
    throw new NoDataError(SALES_ORDERS_SOURCE)
  }

  const daily_sales = Array.from(
    accumulate(rows, (row) => row.order_date),
    ([date, bucket]) => ({ date, sales: normalizeNumber(bucket.totalSales) })
  ).sort((a, b) => compareText(a.date, b.date))

  const segment_sales: SegmentSales[] = Array.from(
    accumulate(rows, (row) => row.customer_segment),
    ([segment, bucket]) => ({ segment, ...summarize(bucket) })
  ).sort(
    composeComparators(
      byNumberDesc((item: SegmentSales) => item.total_sales),
      byTextAsc((item: SegmentSales) => item.segment)
    )
  )

  const payment_method_sales: PaymentMethodSales[] = Array.from(
    accumulate(rows, (row) => row.payment_method),
    ([payment_method, bucket]) => ({ payment_method, ...summarize(bucket) })
  ).sort(
    composeComparators(
      byNumberDesc((item: PaymentMethodSales) => item.total_sales),
      byTextAsc((item: PaymentMethodSales) => item.payment_method)
    )
  )

  const high_value_orders: HighValueOrder[] = rows
    .filter((row) => row.order_amount >= highValueThreshold)
    .map((row) => ({
      order_id: row.order_id,
      order_date: row.order_date,
      segment: row.customer_segment,
      payment_method: row.payment_method,
      order_amount: normalizeNumber(row.order_amount),
    }))
    .sort(
      composeComparators(
        byNumberDesc((item: HighValueOrder) => item.order_amount),
        byTextAsc((item: HighValueOrder) => item.order_id),
        byTextAsc((item: HighValueOrder) => item.order_date)
      )
    )

  const dates = rows.map((row) => row.order_date).sort(compareText)

  return {
    summary: {
      total_rows: rows.length,
      date_range_start: dates[0],
      date_range_end: dates[dates.length - 1],
      total_revenue: normalizeNumber(sumOf(rows.map((row) => row.order_amount))),
      high_value_order_count: high_value_orders.length,
    },
    daily_sales,
    segment_sales,
    payment_method_sales,
    high_value_orders,
  }
}

export const salesOrderRowSchema = z.object({
  order_id: textField,
  order_date: calendarDateField,
  customer_segment: textField,
  payment_method: textField,
  order_amount: numberField,
})

/**
 * Coerces driver rows. `order_date` may be a Date or a date string;
 * `order_amount` may be a number or a numeric string (NUMERIC columns).
 * @throws InvalidRecordError On a missing field, bad date or non-numeric amount.
 */
export const toSalesOrderRows = (records: readonly InputRecord[]): SalesOrderRow[] =>
  parseRecords(salesOrderRowSchema, records, SALES_ORDERS_SOURCE)
