import { describe, expect, it } from 'vitest'
import { byNumberDesc, byTextAsc, compareText, composeComparators } from './compare'

interface Bucket {
  name: string
  sales: number
}

describe('compareText', () => {
  it('orders by code unit, so uppercase sorts before lowercase', () => {
    expect(['b', 'B', 'a', 'A'].sort(compareText)).toEqual(['A', 'B', 'a', 'b'])
  })
})

describe('composeComparators', () => {
  it('breaks ties with later comparators', () => {
    const buckets: Bucket[] = [
      { name: 'Pen', sales: 20 },
      { name: 'Apple', sales: 20 },
      { name: 'Notebook', sales: 45 },
    ]
    const sorted = [...buckets].sort(
      composeComparators(
        byNumberDesc((bucket: Bucket) => bucket.sales),
        byTextAsc((bucket: Bucket) => bucket.name)
      )
    )
    expect(sorted.map((bucket) => bucket.name)).toEqual(['Notebook', 'Apple', 'Pen'])
  })
})
