export const IRR_BOUNDS = { low: -0.99, high: 10, tolerance: 1e-10, maxIterations: 300 } as const

export type IrrOutcome =
  | { ok: true; rate: number; iterations: number }
  | { ok: false; reason: 'no-sign-change' | 'did-not-converge' | 'non-finite' }

export function npv(rate: number, flows: readonly number[]): number {
  let v = 0
  for (let t = 0; t < flows.length; t++) v += flows[t] / Math.pow(1 + rate, t)
  return v
}

// [-investment, inflow year 1, ..., inflow year H]
export function buildCashFlows(investment: number, inflows: readonly number[]): number[] {
  return [-investment, ...inflows]
}

/**
 * Bisection for the rate where NPV crosses zero. An IRR that does not exist on the
 * bracket (all-zero inflows, or inflows that never repay) is reported, not guessed.
 */
export function solveIrr(flows: readonly number[]): IrrOutcome {
  if (!flows.every((f) => Number.isFinite(f))) return { ok: false, reason: 'non-finite' }
  let lo: number = IRR_BOUNDS.low
  let hi: number = IRR_BOUNDS.high
  let fLo = npv(lo, flows)
  const fHi = npv(hi, flows)
  if (!Number.isFinite(fLo) || !Number.isFinite(fHi)) return { ok: false, reason: 'non-finite' }
  if (fLo === 0) return { ok: true, rate: lo, iterations: 0 }
  if (fHi === 0) return { ok: true, rate: hi, iterations: 0 }
  if (Math.sign(fLo) === Math.sign(fHi)) return { ok: false, reason: 'no-sign-change' }

  for (let i = 1; i <= IRR_BOUNDS.maxIterations; i++) {
    const mid = (lo + hi) / 2
    const fMid = npv(mid, flows)
    if (fMid === 0 || (hi - lo) / 2 < IRR_BOUNDS.tolerance) return { ok: true, rate: mid, iterations: i }
    if (Math.sign(fMid) === Math.sign(fLo)) {
      lo = mid
      fLo = fMid
    } else {
      hi = mid
    }
  }
  return { ok: false, reason: 'did-not-converge' }
}
