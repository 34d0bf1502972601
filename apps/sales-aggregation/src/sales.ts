import { z } from 'zod'
import {
  byNumberDesc,
  byTextAsc,
  composeComparators,
  compareText,
  normalizeNumber,
  numberField,
  parseRecords,
  textField,
  type InputRecord,
  type SalesDetail,
} from '@report-drills/pipeline-common'

export interface DailySales {
  date: string
  sales: number
}

export interface CategorySales {
  category: string
  sales: number
}

export interface ProductSales {
  product: string
  sales: number
  quantity: number
}

export interface SalesAggregation {
  daily_sales: DailySales[]
  category_sales: CategorySales[]
  top_products: ProductSales[]
}

export const TOP_PRODUCT_LIMIT = 3

interface ProductBucket {
  sales: number
  quantity: number
}

const addTo = (buckets: Map<string, number>, key: string, amount: number): void => {
  buckets.set(key, (buckets.get(key) ?? 0) + amount)
}

/**
 * Aggregates sales lines by day, category and product.
 * Sums are kept exact until presentation; ordering compares the normalized sums.
 */
export const aggregateSales = (rows: readonly SalesDetail[]): SalesAggregation => {
  const byDate = new Map<string, number>()
  const byCategory = new Map<string, number>()
  const byProduct = new Map<string, ProductBucket>()

  for (const row of rows) {
    const lineTotal = row.quantity * row.price
    addTo(byDate, row.date, lineTotal)
    addTo(byCategory, row.category, lineTotal)

    const bucket = byProduct.get(row.product) ?? { sales: 0, quantity: 0 }
    bucket.sales += lineTotal
    bucket.quantity += row.quantity
    byProduct.set(row.product, bucket)
  }

  const daily_sales = Array.from(byDate, ([date, sales]) => ({
    date,
    sales: normalizeNumber(sales),
  })).sort((a, b) => compareText(a.date, b.date))

  const category_sales = Array.from(byCategory, ([category, sales]) => ({
    category,
    sales: normalizeNumber(sales),
  })).sort(
    composeComparators(
      byNumberDesc((item: CategorySales) => item.sales),
      byTextAsc((item: CategorySales) => item.category)
    )
  )

  const top_products = Array.from(byProduct, ([product, bucket]) => ({
    product,
    sales: normalizeNumber(bucket.sales),
    quantity: bucket.quantity,
  }))
    .sort(
      composeComparators(
        byNumberDesc((item: ProductSales) => item.sales),
        byTextAsc((item: ProductSales) => item.product)
      )
    )
    .slice(0, TOP_PRODUCT_LIMIT)

  return { daily_sales, category_sales, top_products }
}

export const salesDetailSchema = z.object({
  date: textField,
  product: textField,
  category: textField,
  quantity: numberField,
  price: numberField,
})

/**
 * Coerces loose rows (CSV strings, JSON or Parquet values) into sales lines.
 * @throws InvalidRecordError When a field is missing or quantity/price is not numeric.
 */
export const toSalesDetails = (records: readonly InputRecord[]): SalesDetail[] =>
  parseRecords(salesDetailSchema, records)
