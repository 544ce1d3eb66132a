import type { IrrStats } from '../types/engine'

// Linear interpolation between closest ranks; `sorted` must be ascending
export function quantile(sorted: readonly number[], q: number): number {
  if (!sorted.length) return NaN
  const pos = Math.max(0, Math.min(1, q)) * (sorted.length - 1)
  const lo = Math.floor(pos)
  const hi = Math.ceil(pos)
  if (lo === hi) return sorted[lo]
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo)
}

export function mean(values: readonly number[]): number {
  if (!values.length) return NaN
  return values.reduce((s, v) => s + v, 0) / values.length
}

export function sortedCopy(values: readonly number[]): number[] {
  return values.slice().sort((a, b) => a - b)
}

// Undefined IRRs (NaN) are counted, never averaged in
export function summarizeIrr(values: readonly number[]): IrrStats {
  const defined = sortedCopy(values.filter((v) => Number.isFinite(v)))
  return {
    mean: mean(defined),
    p10: quantile(defined, 0.1),
    p50: quantile(defined, 0.5),
    p90: quantile(defined, 0.9),
    undefinedRuns: values.length - defined.length
  }
}
