/**
 * Running Skewness
 * Extends the running moments with the third central moment
 * (Terriberry's update, Pébay's pairwise combination)
 */

import { debug } from '../log.ts'
import { invariant } from './invariant.ts'
import { MomentAccumulator, type MomentSummary } from './moments.ts'

export interface SkewnessSummary extends MomentSummary {
  skewness: number
}

/**
 * Mean, variance and skewness accumulator.
 *
 * Owns a {@link MomentAccumulator} for the first two moments and forwards
 * those queries to it unchanged.
 */
export class SkewnessAccumulator {
  private readonly moments = new MomentAccumulator()
  private sumCube = 0 // sum of cubed deviations from the mean (M3)

  static from(values: Iterable<number>): SkewnessAccumulator {
    const acc = new SkewnessAccumulator()
    acc.addAll(values)
    return acc
  }

  add(x: number): void {
    const step = this.moments.planAdd(x)
    // M3 reads M2 from before this observation
    this.sumCube +=
      step.term * step.deltaN * (step.n - 2) - 3 * step.deltaN * step.sumSqBefore
    this.moments.applyAdd(step)
  }

  addAll(values: Iterable<number>): void {
    for (const x of values) {
      this.add(x)
    }
  }

  /**
   * Absorb the statistics of a disjoint partition. `other` is left unchanged.
   */
  merge(other: SkewnessAccumulator): void {
    if (other === this) {
      debug('skewness', `self-merge of ${this.len()} observations`)
    }
    const step = this.moments.planMerge(other.moments)
    if (!step) return

    const { n1, n2, delta, deltaN, sumSq1, sumSq2 } = step
    if (n1 === 0) {
      this.sumCube = other.sumCube
    } else {
      this.sumCube +=
        other.sumCube +
        delta * deltaN * deltaN * n1 * n2 * (n1 - n2) +
        3 * deltaN * (n1 * sumSq2 - n2 * sumSq1)
    }
    this.moments.applyMerge(step)
  }

  /**
   * Population skewness, `sqrt(n) * M3 / M2^1.5`.
   * Returns 0 when M3 is exactly 0, which covers the empty accumulator.
   */
  skewness(): number {
    if (this.sumCube === 0) return 0
    const sumSq = this.moments.sumOfSquares()
    invariant(sumSq !== 0, 'non-zero third moment with zero second moment')
    return (Math.sqrt(this.len()) * this.sumCube) / Math.pow(sumSq, 1.5)
  }

  isEmpty(): boolean {
    return this.moments.isEmpty()
  }

  len(): number {
    return this.moments.len()
  }

  mean(): number {
    return this.moments.mean()
  }

  sampleVariance(): number {
    return this.moments.sampleVariance()
  }

  populationVariance(): number {
    return this.moments.populationVariance()
  }

  sampleStdDev(): number {
    return this.moments.sampleStdDev()
  }

  populationStdDev(): number {
    return this.moments.populationStdDev()
  }

  error(): number {
    return this.moments.error()
  }

  clone(): SkewnessAccumulator {
    const copy = new SkewnessAccumulator()
    copy.moments.merge(this.moments)
    copy.sumCube = this.sumCube
    return copy
  }

  summary(): SkewnessSummary {
    return {
      ...this.moments.summary(),
      skewness: this.skewness(),
    }
  }
}
