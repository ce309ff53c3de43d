/**
 * Sorted Set
 *
 * Ordered, duplicate-free sequence of branded date/time strings. Holds the
 * explicit inclusion and exclusion lists of a recurrence. Lookups are binary
 * searches; subtraction of another sorted sequence is a single linear sweep
 * that reports where it stopped so several sweeps can be chained.
 */

type Comparable = string

// ============================================================================
// Types
// ============================================================================

export type SortedSet<T extends Comparable> = {
  readonly size: number
  values(): T[]
  at(index: number): T | undefined
  first(): T | undefined
  last(): T | undefined
  /** Returns false when the value was already present. */
  insert(value: T): boolean
  remove(value: T): boolean
  contains(value: T): boolean
  indexOf(value: T): number
  /** Index of the first element strictly greater than `value`, or -1. */
  findGreaterThan(value: T): number
  /** Index of the last element strictly less than `value`, or -1. */
  findLessThan(value: T): number
  /** Replace the contents with `values`, sorted and deduplicated. */
  assign(values: Iterable<T>): void
  /**
   * Remove every element that appears in `other` (ascending), starting the
   * sweep at `startHint`. Returns the index the sweep reached.
   */
  removeAll(other: Iterable<T>, startHint?: number): number
  clear(): void
  clone(): SortedSet<T>
  equals(other: SortedSet<T>): boolean
  [Symbol.iterator](): Iterator<T>
}

// ============================================================================
// Array Helpers
// ============================================================================

/** Index of the first element >= value (insertion point). */
export function lowerBound<T extends Comparable>(items: readonly T[], value: T): number {
  let lo = 0
  let hi = items.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    const item = items[mid]
    if (item !== undefined && item < value) lo = mid + 1
    else hi = mid
  }
  return lo
}

/** Sort ascending and drop duplicates, in place. Returns the same array. */
export function sortUnique<T extends Comparable>(items: T[]): T[] {
  items.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
  let write = 0
  for (let read = 0; read < items.length; read++) {
    const item = items[read]
    if (item === undefined) continue
    if (write === 0 || items[write - 1] !== item) {
      items[write++] = item
    }
  }
  items.length = write
  return items
}

/**
 * Remove every element of `items` found in `remove` with one merge-style pass.
 * Both arrays must be ascending. Returns the index in `items` reached.
 */
export function removeSortedAll<T extends Comparable>(
  items: T[],
  remove: Iterable<T>,
  startHint = 0
): number {
  let i = Math.max(0, Math.min(startHint, items.length))
  for (const value of remove) {
    while (i < items.length) {
      const item = items[i]
      if (item === undefined || item >= value) break
      i++
    }
    if (i >= items.length) break
    if (items[i] === value) items.splice(i, 1)
  }
  return i
}

// ============================================================================
// Factory
// ============================================================================

export function createSortedSet<T extends Comparable>(initial?: Iterable<T>): SortedSet<T> {
  let items: T[] = initial ? sortUnique([...initial]) : []

  function indexOf(value: T): number {
    const i = lowerBound(items, value)
    return items[i] === value ? i : -1
  }

  const set: SortedSet<T> = {
    get size() {
      return items.length
    },

    values(): T[] {
      return [...items]
    },

    at(index: number): T | undefined {
      return items[index]
    },

    first(): T | undefined {
      return items[0]
    },

    last(): T | undefined {
      return items[items.length - 1]
    },

    insert(value: T): boolean {
      const i = lowerBound(items, value)
      if (items[i] === value) return false
      items.splice(i, 0, value)
      return true
    },

    remove(value: T): boolean {
      const i = indexOf(value)
      if (i < 0) return false
      items.splice(i, 1)
      return true
    },

    contains(value: T): boolean {
      return indexOf(value) >= 0
    },

    indexOf,

    findGreaterThan(value: T): number {
      let i = lowerBound(items, value)
      if (items[i] === value) i++
      return i < items.length ? i : -1
    },

    findLessThan(value: T): number {
      return lowerBound(items, value) - 1
    },

    assign(values: Iterable<T>): void {
      items = sortUnique([...values])
    },

    removeAll(other: Iterable<T>, startHint = 0): number {
      return removeSortedAll(items, other, startHint)
    },

    clear(): void {
      items = []
    },

    clone(): SortedSet<T> {
      return createSortedSet(items)
    },

    equals(other: SortedSet<T>): boolean {
      if (other.size !== items.length) return false
      return items.every((item, i) => other.at(i) === item)
    },

    [Symbol.iterator](): Iterator<T> {
      return items[Symbol.iterator]()
    },
  }

  return set
}
