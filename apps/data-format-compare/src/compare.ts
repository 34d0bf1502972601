import type { SalesDetail } from '@report-drills/pipeline-common'
import { aggregateSales, type SalesAggregation } from '../../sales-aggregation/src/sales'

export interface Difference<T> {
  index: number
  json_value: T | null
  parquet_value: T | null
}

export interface AggregationDifferences {
  daily_sales: Difference<SalesAggregation['daily_sales'][number]>[]
  category_sales: Difference<SalesAggregation['category_sales'][number]>[]
  top_products: Difference<SalesAggregation['top_products'][number]>[]
}

export interface DataFormatCompareSummary {
  json_record_count: number
  parquet_record_count: number
  is_equivalent: boolean
}

export interface DataFormatCompareResult {
  summary: DataFormatCompareSummary
  json_aggregations: SalesAggregation
  parquet_aggregations: SalesAggregation
  differences: AggregationDifferences
}

/**
 * Position-by-position comparison of two collections by their serialized form.
 * A side that runs out first contributes null.
 */
export const diffByPosition = <T>(jsonItems: readonly T[], parquetItems: readonly T[]) => {
  const differences: Difference<T>[] = []
  const length = Math.max(jsonItems.length, parquetItems.length)
  for (let index = 0; index < length; index += 1) {
    const json_value = index < jsonItems.length ? jsonItems[index] : null
    const parquet_value = index < parquetItems.length ? parquetItems[index] : null
    if (JSON.stringify(json_value) !== JSON.stringify(parquet_value)) {
      differences.push({ index, json_value, parquet_value })
    }
  }
  return differences
}

/**
 * Aggregates the same sales data read from JSON and from Parquet and reports
 * whether both produce identical results.
 */
export const compareFormats = (
  jsonRows: readonly SalesDetail[],
  parquetRows: readonly SalesDetail[]
): DataFormatCompareResult => {
  const json_aggregations = aggregateSales(jsonRows)
  const parquet_aggregations = aggregateSales(parquetRows)

  const differences: AggregationDifferences = {
    daily_sales: diffByPosition(json_aggregations.daily_sales, parquet_aggregations.daily_sales),
    category_sales: diffByPosition(
      json_aggregations.category_sales,
      parquet_aggregations.category_sales
    ),
    top_products: diffByPosition(json_aggregations.top_products, parquet_aggregations.top_products),
  }

  return {
    summary: {
      json_record_count: jsonRows.length,
      parquet_record_count: parquetRows.length,
      is_equivalent:
        differences.daily_sales.length === 0 &&
        differences.category_sales.length === 0 &&
        differences.top_products.length === 0,
    },
    json_aggregations,
    parquet_aggregations,
    differences,
  }
}
