import type { EconomyParams, EconomySnapshot } from '../types/engine'
import { logNormal, normal, type RandomContext } from './random'

export const INFLATION_BOUNDS = { min: -0.02, max: 0.15 } as const
export const UNEMPLOYMENT_BOUNDS = { min: 0, max: 0.5 } as const

const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v))

export interface IsaIndexation {
  threshold: number
  cap: number
  indexToInflation: boolean
}

/**
 * Shared macro state for one cohort run. Mean-reverting towards the starting levels;
 * each draw is clamped to INFLATION_BOUNDS / UNEMPLOYMENT_BOUNDS.
 */
export class EconomicEnvironment {
  private readonly stableInflation: number
  private readonly stableUnemployment: number
  private readonly terms: IsaIndexation
  private year = 0
  private inflation: number
  private unemployment: number
  private priceLevel = 1
  private indexFactor = 1

  constructor(params: EconomyParams, terms: IsaIndexation, private readonly ctx: RandomContext) {
    this.stableInflation = params.initialInflation
    this.stableUnemployment = params.initialUnemployment
    this.inflation = clamp(params.initialInflation, INFLATION_BOUNDS.min, INFLATION_BOUNDS.max)
    this.unemployment = clamp(params.initialUnemployment, UNEMPLOYMENT_BOUNDS.min, UNEMPLOYMENT_BOUNDS.max)
    this.terms = { ...terms }
  }

  advance(): EconomySnapshot {
    const inflation = this.stableInflation * 0.45 + this.inflation * 0.5 + normal(this.ctx, 0, 0.01)
    const unemployment = this.stableUnemployment * 0.33 + this.unemployment * 0.25 + logNormal(this.ctx, 0, 1) / 100
    this.inflation = clamp(inflation, INFLATION_BOUNDS.min, INFLATION_BOUNDS.max)
    this.unemployment = clamp(unemployment, UNEMPLOYMENT_BOUNDS.min, UNEMPLOYMENT_BOUNDS.max)
    this.priceLevel *= 1 + this.inflation
    // contract terms only ever index upwards
    this.indexFactor = Math.max(this.indexFactor, this.priceLevel)
    this.year += 1
    return this.snapshot()
  }

  snapshot(): EconomySnapshot {
    const factor = this.terms.indexToInflation ? this.indexFactor : 1
    return {
      year: this.year,
      inflation: this.inflation,
      unemployment: this.unemployment,
      priceLevel: this.priceLevel,
      isaThreshold: this.terms.threshold * factor,
      isaCap: this.terms.cap * factor
    }
  }
}
