import type { IsaTerms, Money } from '../types/engine'

export const ZERO: Readonly<Money> = Object.freeze({ nominal: 0, real: 0 })

export const money = (nominal: number, priceLevel: number): Money => ({ nominal, real: nominal / priceLevel })

export const addMoney = (a: Money, b: Money): Money => ({ nominal: a.nominal + b.nominal, real: a.real + b.real })

export const subMoney = (a: Money, b: Money): Money => ({ nominal: a.nominal - b.nominal, real: a.real - b.real })

export interface FeeInput {
  payment: Money
  priceLevel: number
  // investment-indexed only: graduated, employed, not capped, never unemployed since graduating
  servicing: boolean
}

/**
 * Service-provider share of one student-year.
 *
 * performance: a flat cut of whatever was collected.
 * investment-indexed: a fixed slice of the per-student price, inflated to the current
 * price level, owed for every year the student is in good standing regardless of payment.
 */
export function studentYearFee(isa: IsaTerms, input: FeeInput): Money {
  switch (isa.feeMethod) {
    case 'performance':
      return {
        nominal: input.payment.nominal * isa.performanceFeePct,
        real: input.payment.real * isa.performanceFeePct
      }
    case 'investment-indexed': {
      if (!input.servicing) return { ...ZERO }
      const real = isa.pricePerStudent * isa.annualFeeRate
      return { nominal: real * input.priceLevel, real }
    }
  }
}
