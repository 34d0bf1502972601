import {
  EmptyDatasetError,
  normalizeNumber,
  sumOf,
  type SalesDetail,
} from '@report-drills/pipeline-common'
import {
  aggregateSales,
  type CategorySales,
  type DailySales,
  type ProductSales,
} from '../../sales-aggregation/src/sales'

export interface VisualReportSummary {
  total_orders: number
  total_revenue: number
  average_order_value: number
  best_sales_day: string
  best_sales_amount: number
}

export interface VisualReportArtifacts {
  daily_sales_chart: string
  category_sales_chart: string
  top_products_chart: string
  decision_report_markdown: string
}

export interface VisualSalesReport {
  summary: VisualReportSummary
  daily_sales: DailySales[]
  category_sales: CategorySales[]
  top_products: ProductSales[]
  insights: string[]
  artifacts: VisualReportArtifacts
}

export const REPORT_ARTIFACTS: VisualReportArtifacts = {
  daily_sales_chart: 'daily_sales.svg',
  category_sales_chart: 'category_sales.svg',
  top_products_chart: 'top_products.svg',
  decision_report_markdown: 'decision_report.md',
}

const bestDay = (dailySales: readonly DailySales[]): DailySales => {
  let best = dailySales[0]
  for (const item of dailySales) {
    if (item.sales > best.sales) {
      best = item
    }
  }
  return best
}

/**
 * Headline sentences for the decision report.
 */
export const buildInsights = (
  summary: VisualReportSummary,
  categorySales: readonly CategorySales[],
  topProducts: readonly ProductSales[]
): string[] => {
  const [topCategory] = categorySales
  const [topProduct] = topProducts
  return [
    `${summary.best_sales_day} was the best sales day with ${summary.best_sales_amount} in sales.`,
    `${topCategory.category} is the top category with ${topCategory.sales} in sales.`,
    `${topProduct.product} is the top product with ${topProduct.sales} in sales.`,
  ]
}

/**
 * Sales aggregation plus the headline figures and insights behind the charts.
 * @throws EmptyDatasetError When there are no rows.
 */
export const buildVisualSalesReport = (rows: readonly SalesDetail[]): VisualSalesReport => {
  if (rows.length === 0) {
    throw new EmptyDatasetError('sales input')
  }

  const { daily_sales, category_sales, top_products } = aggregateSales(rows)
  const best = bestDay(daily_sales)
  const revenue = sumOf(daily_sales.map((item) => item.sales))

  const summary: VisualReportSummary = {
    total_orders: rows.length,
    total_revenue: normalizeNumber(revenue),
    average_order_value: normalizeNumber(revenue / rows.length),
    best_sales_day: best.date,
    best_sales_amount: best.sales,
  }

  return {
    summary,
    daily_sales,
    category_sales,
    top_products,
    insights: buildInsights(summary, category_sales, top_products),
    artifacts: { ...REPORT_ARTIFACTS },
  }
}
