/**
 * Running Moments
 * Streaming mean and variance via Welford's online algorithm
 * Single-pass, constant memory, mergeable across partitions
 */

import { debug } from '../log.ts'

/**
 * A planned single-observation update, computed against the current state
 * but not yet applied
 */
export interface AddStep {
  n: number // count after this observation
  delta: number // x - mean before
  deltaN: number // delta / n
  term: number // contribution to sumSq: delta * deltaN * (n - 1)
  sumSqBefore: number
}

/**
 * A planned merge with a non-empty partition
 */
export interface MergeStep {
  n1: number
  n2: number
  n: number
  delta: number // mean2 - mean1
  deltaN: number // delta / n
  mean2: number
  sumSq1: number
  sumSq2: number
}

/**
 * Plain snapshot of the derived statistics
 */
export interface MomentSummary {
  n: number
  mean: number
  sampleVariance: number
  populationVariance: number
  stdDev: number // sample standard deviation
  error: number // standard error of the mean
}

/**
 * Mean and variance accumulator.
 *
 * `sampleVariance()` and `error()` return NaN while fewer than two
 * observations have been added. `mean()` and `populationVariance()` return 0
 * for an empty accumulator.
 */
export class MomentAccumulator {
  private count = 0
  private avg = 0
  private sumSq = 0 // sum of squared deviations from the mean (M2)

  static from(values: Iterable<number>): MomentAccumulator {
    const acc = new MomentAccumulator()
    acc.addAll(values)
    return acc
  }

  /**
   * Add an observation. Non-finite values are not rejected; they poison
   * every derived statistic.
   */
  add(x: number): void {
    this.applyAdd(this.planAdd(x))
  }

  addAll(values: Iterable<number>): void {
    for (const x of values) {
      this.add(x)
    }
  }

  /**
   * Absorb the statistics of a disjoint partition. `other` is left unchanged.
   */
  merge(other: MomentAccumulator): void {
    if (other === this) {
      debug('moments', `self-merge of ${this.count} observations`)
    }
    const step = this.planMerge(other)
    if (step) this.applyMerge(step)
  }

  /** @internal */
  planAdd(x: number): AddStep {
    const n = this.count + 1
    const delta = x - this.avg
    const deltaN = delta / n
    return {
      n,
      delta,
      deltaN,
      term: delta * deltaN * (n - 1),
      sumSqBefore: this.sumSq,
    }
  }

  /** @internal */
  applyAdd(step: AddStep): void {
    this.count = step.n
    this.avg += step.deltaN
    this.sumSq += step.term
  }

  /**
   * Returns undefined when `other` is empty: there is nothing to merge.
   * @internal
   */
  planMerge(other: MomentAccumulator): MergeStep | undefined {
    if (other.count === 0) return undefined

    const n1 = this.count
    const n2 = other.count
    const n = n1 + n2
    const delta = other.avg - this.avg
    return {
      n1,
      n2,
      n,
      delta,
      deltaN: delta / n,
      mean2: other.avg,
      sumSq1: this.sumSq,
      sumSq2: other.sumSq,
    }
  }

  /** @internal */
  applyMerge(step: MergeStep): void {
    this.count = step.n
    if (step.n1 === 0) {
      this.avg = step.mean2
      this.sumSq = step.sumSq2
      return
    }
    this.avg += step.deltaN * step.n2
    this.sumSq += step.sumSq2 + step.delta * step.deltaN * step.n1 * step.n2
  }

  isEmpty(): boolean {
    return this.count === 0
  }

  len(): number {
    return this.count
  }

  mean(): number {
    return this.avg
  }

  /**
   * Unbiased estimator, divides by n - 1
   */
  sampleVariance(): number {
    if (this.count < 2) return NaN
    return this.sumSq / (this.count - 1)
  }

  /**
   * Biased estimator, divides by n
   */
  populationVariance(): number {
    if (this.count === 0) return 0
    return this.sumSq / this.count
  }

  sampleStdDev(): number {
    return Math.sqrt(this.sampleVariance())
  }

  populationStdDev(): number {
    return Math.sqrt(this.populationVariance())
  }

  /**
   * Standard error of the mean
   */
  error(): number {
    return Math.sqrt(this.sampleVariance() / this.count)
  }

  /** @internal */
  sumOfSquares(): number {
    return this.sumSq
  }

  clone(): MomentAccumulator {
    const copy = new MomentAccumulator()
    copy.count = this.count
    copy.avg = this.avg
    copy.sumSq = this.sumSq
    return copy
  }

  summary(): MomentSummary {
    return {
      n: this.count,
      mean: this.mean(),
      sampleVariance: this.sampleVariance(),
      populationVariance: this.populationVariance(),
      stdDev: this.sampleStdDev(),
      error: this.error(),
    }
  }
}
