/**
 * Statistics module exports
 */

export { MomentAccumulator } from './moments.ts'
export type { MomentSummary, AddStep, MergeStep } from './moments.ts'

export { SkewnessAccumulator } from './skewness.ts'
export type { SkewnessSummary } from './skewness.ts'

export { mergeAll, foldPartitions } from './parallel.ts'
export type { Mergeable } from './parallel.ts'

export { invariant } from './invariant.ts'
