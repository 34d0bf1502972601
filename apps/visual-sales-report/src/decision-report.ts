import type { VisualSalesReport } from './visual-report'

/**
 * Markdown summary that links the generated charts.
 */
export const renderDecisionReport = (report: VisualSalesReport): string => {
  const { summary, insights, artifacts } = report
  const lines = [
    '# Sales Visual Report',
    '',
    '## Summary',
    `- Total orders: ${summary.total_orders}`,
    `- Total revenue: ${summary.total_revenue}`,
    `- Average order value: ${summary.average_order_value}`,
    `- Best sales day: ${summary.best_sales_day} (${summary.best_sales_amount})`,
    '',
    '## Decision notes',
    ...insights.map((insight) => `- ${insight}`),
    '',
    '## Charts',
    `- Daily sales: \`${artifacts.daily_sales_chart}\``,
    `- Category sales: \`${artifacts.category_sales_chart}\``,
    `- Top products: \`${artifacts.top_products_chart}\``,
  ]
  return `${lines.join('\n')}\n`
}
