import pg from 'pg'
import type { InputRecord } from '@report-drills/pipeline-common'

/**
 * Columns consumed by the SQL sales report. The date is cast to text so the
 * driver does not shift it through the local time zone.
 */
export const SALES_ORDERS_QUERY = `
  SELECT
    order_id,
    order_date::text AS order_date,
    customer_segment,
    payment_method,
    order_amount
  FROM sales_orders
  ORDER BY order_date, order_id
`

/**
 * Runs a read-only query on a short-lived connection.
 */
const queryRecords = async (databaseUrl: string, sql: string): Promise<InputRecord[]> => {
  const client = new pg.Client({ connectionString: databaseUrl })
  await client.connect()
  try {
    const result = await client.query<InputRecord>(sql)
    return result.rows
  } finally {
    await client.end()
  }
}

export const querySalesOrders = (databaseUrl: string): Promise<InputRecord[]> =>
  queryRecords(databaseUrl, SALES_ORDERS_QUERY)
