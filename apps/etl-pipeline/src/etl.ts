import {
  byTextAsc,
  coerceCalendarDate,
  coerceNumber,
  composeComparators,
  medianOr,
  normalizeNumber,
  roundHalfEven,
  sumOf,
  type InputRecord,
} from '@report-drills/pipeline-common'

export const UNKNOWN_CUSTOMER = 'UNKNOWN_CUSTOMER'
export const DEFAULT_QUANTITY_FILL = 1
export const DEFAULT_UNIT_PRICE_FILL = 0
export const SAMPLE_ROW_COUNT = 3

export interface CleanOrder {
  order_id: string
  /** YYYY-MM-DD */
  order_date: string
  customer_id: string
  product: string
  quantity: number
  unit_price: number
  /** YYYY-MM */
  order_month: string
  line_total: number
}

export interface ExtractStats {
  input_records: number
}

export interface TransformStats {
  transformed_records: number
  dropped_invalid_order_date_count: number
  filled_customer_id_count: number
  filled_quantity_count: number
  filled_unit_price_count: number
  quantity_fill_value: number
  unit_price_fill_value: number
}

export interface LoadStats {
  output_path: string
  loaded_records: number
}

export interface EtlSummary {
  extract: ExtractStats
  transform: TransformStats
  load: LoadStats
  total_sales: number
}

export interface EtlResult {
  summary: EtlSummary
  sample_cleaned_rows: CleanOrder[]
}

export interface TransformOutput {
  rows: CleanOrder[]
  stats: TransformStats
}

/**
 * Persists cleaned orders (the load stage).
 */
export interface CleanOrderWriter {
  write(outputPath: string, rows: readonly CleanOrder[]): Promise<LoadStats>
}

interface DatedRow {
  orderId: string
  orderDate: string
  customerId: string
  product: string
  quantity: number | undefined
  unitPrice: number | undefined
}

const rawText = (value: unknown): string =>
  value === null || value === undefined ? '' : String(value).trim()

const parseNumber = (text: string): number | undefined => {
  const parsed = coerceNumber(text)
  return parsed.ok ? parsed.value : undefined
}

const isValidQuantity = (value: number | undefined): value is number =>
  value !== undefined && value > 0

const isValidUnitPrice = (value: number | undefined): value is number =>
  value !== undefined && value >= 0

/**
 * Cleans raw order rows: drops rows without a usable order date, fills
 * missing customers, quantities and prices, and derives month and line total.
 * Quantity and price fills are the medians of the valid values that remain
 * after the date filter.
 */
export const transformOrders = (rawRows: readonly InputRecord[]): TransformOutput => {
  const dated: DatedRow[] = []
  let droppedInvalidDate = 0

  for (const raw of rawRows) {
    const orderDate = coerceCalendarDate(rawText(raw.order_date))
    if (!orderDate.ok) {
      droppedInvalidDate += 1
      continue
    }
    dated.push({
      orderId: rawText(raw.order_id),
      orderDate: orderDate.value,
      customerId: rawText(raw.customer_id),
      product: rawText(raw.product),
      quantity: parseNumber(rawText(raw.quantity)),
      unitPrice: parseNumber(rawText(raw.unit_price)),
    })
  }

  const quantityFill = medianOr(
    dated.map((row) => row.quantity).filter(isValidQuantity),
    DEFAULT_QUANTITY_FILL
  )
  const unitPriceFill = medianOr(
    dated.map((row) => row.unitPrice).filter(isValidUnitPrice),
    DEFAULT_UNIT_PRICE_FILL
  )

  let filledCustomer = 0
  let filledQuantity = 0
  let filledUnitPrice = 0

  const rows = dated.map((row): CleanOrder => {
    if (row.customerId === '') filledCustomer += 1
    if (!isValidQuantity(row.quantity)) filledQuantity += 1
    if (!isValidUnitPrice(row.unitPrice)) filledUnitPrice += 1

    const quantity = roundHalfEven(isValidQuantity(row.quantity) ? row.quantity : quantityFill, 0)
    const unitPrice = isValidUnitPrice(row.unitPrice) ? row.unitPrice : unitPriceFill

    return {
      order_id: row.orderId,
      order_date: row.orderDate,
      customer_id: row.customerId === '' ? UNKNOWN_CUSTOMER : row.customerId,
      product: row.product,
      quantity,
      unit_price: unitPrice,
      order_month: row.orderDate.slice(0, 7),
      line_total: roundHalfEven(quantity * unitPrice, 2),
    }
  })

  rows.sort(
    composeComparators(
      byTextAsc((row: CleanOrder) => row.order_date),
      byTextAsc((row: CleanOrder) => row.order_id)
    )
  )

  return {
    rows,
    stats: {
      transformed_records: rows.length,
      dropped_invalid_order_date_count: droppedInvalidDate,
      filled_customer_id_count: filledCustomer,
      filled_quantity_count: filledQuantity,
      filled_unit_price_count: filledUnitPrice,
      quantity_fill_value: normalizeNumber(quantityFill),
      unit_price_fill_value: normalizeNumber(unitPriceFill),
    },
  }
}

const toSampleRow = (row: CleanOrder): CleanOrder => ({
  ...row,
  unit_price: normalizeNumber(row.unit_price),
  line_total: normalizeNumber(row.line_total),
})

/**
 * Extract, transform and load a batch of raw orders.
 */
export const runEtl = async (
  rawRows: readonly InputRecord[],
  writer: CleanOrderWriter,
  outputPath: string
): Promise<EtlResult> => {
  const { rows, stats } = transformOrders(rawRows)
  const load = await writer.write(outputPath, rows)

  return {
    summary: {
      extract: { input_records: rawRows.length },
      transform: stats,
      load,
      total_sales: normalizeNumber(sumOf(rows.map((row) => row.line_total))),
    },
    sample_cleaned_rows: rows.slice(0, SAMPLE_ROW_COUNT).map(toSampleRow),
  }
}
