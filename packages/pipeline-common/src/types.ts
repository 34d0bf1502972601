/**
 * One input row as delivered by a reader (CSV, JSON Lines, JSON, Parquet, SQL).
 * Values are loosely typed; reports coerce the fields they need.
 */
export type InputRecord = Record<string, unknown>

/**
 * One sales line item.
 */
export interface SalesDetail {
  date: string
  product: string
  category: string
  quantity: number
  price: number
}
