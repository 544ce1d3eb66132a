import type { RandomContext } from '../../src/engine/random'
import type { EconomySnapshot, IsaTerms } from '../../src/types/engine'

function replay(src: number | number[], kind: string): () => number {
  if (!Array.isArray(src)) {
    const value = src
    return () => value
  }
  const queue = [...src]
  return () => {
    const v = queue.shift()
    if (v === undefined) throw new Error(`scripted ${kind} draws exhausted`)
    return v
  }
}

// Replays fixed draws; a constant repeats forever, an array throws once exhausted
export function scriptedContext(uniforms: number | number[], normals: number | number[] = 0): RandomContext {
  return { random: replay(uniforms, 'uniform'), randn: replay(normals, 'normal') }
}

export function steadyEconomy(overrides: Partial<EconomySnapshot> = {}): EconomySnapshot {
  return { year: 0, inflation: 0.02, unemployment: 0.04, priceLevel: 1, isaThreshold: 27000, isaCap: 72500, ...overrides }
}

export function universityTerms(overrides: Partial<IsaTerms> = {}): IsaTerms {
  return {
    percentage: 0.14,
    threshold: 27000,
    cap: 72500,
    yearsCap: 10,
    pricePerStudent: 29000,
    performanceFeePct: 0.15,
    feeMethod: 'performance',
    annualFeeRate: 0.01,
    indexToInflation: false,
    ...overrides
  }
}
