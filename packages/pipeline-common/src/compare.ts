export type Comparator<T> = (a: T, b: T) => number

/**
 * Orders strings by UTF-16 code units, independent of locale.
 */
export const compareText = (a: string, b: string): number => {
  if (a < b) {
    return -1
  }
  return a > b ? 1 : 0
}

export const byTextAsc =
  <T>(pick: (item: T) => string): Comparator<T> =>
  (a, b) =>
    compareText(pick(a), pick(b))

export const byNumberDesc =
  <T>(pick: (item: T) => number): Comparator<T> =>
  (a, b) =>
    pick(b) - pick(a)

/**
 * Combines comparators; later ones only break ties left by earlier ones.
 */
export const composeComparators =
  <T>(...comparators: Comparator<T>[]): Comparator<T> =>
  (a, b) => {
    for (const comparator of comparators) {
      const result = comparator(a, b)
      if (result !== 0) {
        return result
      }
    }
    return 0
  }
