import { z } from 'zod'
import {
  byNumberDesc,
  byTextAsc,
  compareText,
  composeComparators,
  normalizeNumber,
  numberField,
  parseRecords,
  textField,
  type InputRecord,
} from '@report-drills/pipeline-common'

export const UNKNOWN_SEGMENT = 'Unknown'

export interface CustomerRecord {
  customer_id: string
  customer_name: string
  segment: string
}

export interface OrderRecord {
  order_id: string
  order_date: string
  customer_id: string
  product: string
  quantity: number
  unit_price: number
}

export interface SegmentSales {
  segment: string
  total_sales: number
  order_count: number
  avg_order_amount: number
  unique_customers: number
}

export interface SegmentTopProduct {
  segment: string
  product: string
  total_sales: number
  total_quantity: number
}

export interface OrphanOrder {
  order_id: string
  order_date: string
  customer_id: string
  product: string
  line_total: number
}

export interface JoinSummary {
  customers_count: number
  orders_count: number
  inner_join_rows: number
  left_join_rows: number
  orphan_order_count: number
}

export interface CustomerOrderJoinResult {
  summary: JoinSummary
  segment_sales_inner: SegmentSales[]
  segment_sales_left: SegmentSales[]
  top_products_by_segment_inner: SegmentTopProduct[]
  orphan_orders: OrphanOrder[]
}

interface JoinedOrder {
  order: OrderRecord
  lineTotal: number
  segment: string
}

interface SegmentBucket {
  totalSales: number
  orderCount: number
  customers: Set<string>
}

interface ProductBucket {
  segment: string
  product: string
  totalSales: number
  totalQuantity: number
}

const bySalesThenSegment = <T extends { segment: string; total_sales: number }>() =>
  composeComparators(
    byNumberDesc((item: T) => item.total_sales),
    byTextAsc((item: T) => item.segment)
  )

const buildSegmentSales = (rows: readonly JoinedOrder[]): SegmentSales[] => {
  const buckets = new Map<string, SegmentBucket>()
  for (const row of rows) {
    const bucket = buckets.get(row.segment) ?? {
      totalSales: 0,
      orderCount: 0,
      customers: new Set<string>(),
    }
    bucket.totalSales += row.lineTotal
    bucket.orderCount += 1
    bucket.customers.add(row.order.customer_id)
    buckets.set(row.segment, bucket)
  }

  return Array.from(buckets, ([segment, bucket]) => ({
    segment,
    total_sales: normalizeNumber(bucket.totalSales),
    order_count: bucket.orderCount,
    avg_order_amount: normalizeNumber(bucket.totalSales / bucket.orderCount),
    unique_customers: bucket.customers.size,
  })).sort(bySalesThenSegment<SegmentSales>())
}

const buildTopProductsBySegment = (rows: readonly JoinedOrder[]): SegmentTopProduct[] => {
  const buckets = new Map<string, ProductBucket>()
  for (const row of rows) {
    // segment x product
    const key = JSON.stringify([row.segment, row.order.product])
    const bucket = buckets.get(key) ?? {
      segment: row.segment,
      product: row.order.product,
      totalSales: 0,
      totalQuantity: 0,
    }
    bucket.totalSales += row.lineTotal
    bucket.totalQuantity += row.order.quantity
    buckets.set(key, bucket)
  }

  const best = new Map<string, SegmentTopProduct>()
  for (const bucket of buckets.values()) {
    const candidate: SegmentTopProduct = {
      segment: bucket.segment,
      product: bucket.product,
      total_sales: normalizeNumber(bucket.totalSales),
      total_quantity: bucket.totalQuantity,
    }
    const current = best.get(bucket.segment)
    const better =
      !current ||
      candidate.total_sales > current.total_sales ||
      (candidate.total_sales === current.total_sales &&
        compareText(candidate.product, current.product) < 0)
    if (better) {
      best.set(bucket.segment, candidate)
    }
  }

  return Array.from(best.values()).sort(bySalesThenSegment<SegmentTopProduct>())
}

/**
 * Inner and left joins of orders onto customers, summarized per segment.
 * Orders whose customer is unknown appear only in the left join (segment
 * "Unknown") and are listed as orphans.
 */
export const joinCustomerOrders = (
  customers: readonly CustomerRecord[],
  orders: readonly OrderRecord[]
): CustomerOrderJoinResult => {
  const customersById = new Map<string, CustomerRecord>()
  for (const customer of customers) {
    customersById.set(customer.customer_id, customer)
  }

  const inner: JoinedOrder[] = []
  const left: JoinedOrder[] = []
  const orphans: OrphanOrder[] = []

  for (const order of orders) {
    const lineTotal = order.quantity * order.unit_price
    const customer = customersById.get(order.customer_id)
    if (customer) {
      const joined = { order, lineTotal, segment: customer.segment }
      inner.push(joined)
      left.push(joined)
      continue
    }

    left.push({ order, lineTotal, segment: UNKNOWN_SEGMENT })
    orphans.push({
      order_id: order.order_id,
      order_date: order.order_date,
      customer_id: order.customer_id,
      product: order.product,
      line_total: normalizeNumber(lineTotal),
    })
  }

  orphans.sort(
    composeComparators(
      byTextAsc((orphan: OrphanOrder) => orphan.order_date),
      byTextAsc((orphan: OrphanOrder) => orphan.order_id)
    )
  )

  return {
    summary: {
      customers_count: customers.length,
      orders_count: orders.length,
      inner_join_rows: inner.length,
      left_join_rows: left.length,
      orphan_order_count: orphans.length,
    },
    segment_sales_inner: buildSegmentSales(inner),
    segment_sales_left: buildSegmentSales(left),
    top_products_by_segment_inner: buildTopProductsBySegment(inner),
    orphan_orders: orphans,
  }
}

export const customerRecordSchema = z.object({
  customer_id: textField,
  customer_name: textField,
  segment: textField,
})

export const orderRecordSchema = z.object({
  order_id: textField,
  order_date: textField,
  customer_id: textField,
  product: textField,
  quantity: numberField,
  unit_price: numberField,
})

export const toCustomerRecords = (records: readonly InputRecord[]): CustomerRecord[] =>
  parseRecords(customerRecordSchema, records, 'customers')

export const toOrderRecords = (records: readonly InputRecord[]): OrderRecord[] =>
  parseRecords(orderRecordSchema, records, 'orders')
