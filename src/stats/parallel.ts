/**
 * Partitioned Aggregation
 * Fold disjoint partitions independently, then combine by pairwise merge
 */

export interface Mergeable<T> {
  merge(other: T): void
  clone(): T
}

/**
 * Combine accumulators with a balanced tree of merges.
 * The inputs are not modified.
 */
export function mergeAll<T extends Mergeable<T>>(parts: readonly T[], empty: () => T): T {
  if (parts.length === 0) return empty()
  return mergeRange(parts, 0, parts.length)
}

function mergeRange<T extends Mergeable<T>>(parts: readonly T[], lo: number, hi: number): T {
  if (hi - lo === 1) return parts[lo]!.clone()
  const mid = (lo + hi) >>> 1
  const left = mergeRange(parts, lo, mid)
  left.merge(mergeRange(parts, mid, hi))
  return left
}

/**
 * Split values into contiguous chunks, accumulate each chunk on its own and
 * merge the results
 */
export function foldPartitions<T extends Mergeable<T>>(
  values: readonly number[],
  partitions: number,
  create: (chunk: readonly number[]) => T
): T {
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new Error(`Partition count must be a positive integer, got ${partitions}`)
  }

  const size = Math.ceil(values.length / partitions)
  const parts: T[] = []
  for (let start = 0; start < values.length; start += size) {
    parts.push(create(values.slice(start, start + size)))
  }

  return mergeAll(parts, () => create([]))
}
