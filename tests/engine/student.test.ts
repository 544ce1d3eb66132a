import { describe, expect, it } from 'vitest'
import { createDegree } from '../../src/engine/degrees'
import { StudentLedger } from '../../src/engine/student'
import type { DegreeOverrides, IsaTerms } from '../../src/types/engine'
import type { RandomContext } from '../../src/engine/random'
import { scriptedContext, steadyEconomy, universityTerms } from './fixtures'

function runLedger(overrides: DegreeOverrides, isa: IsaTerms, ctx: RandomContext, years = 10) {
  const ledger = new StudentLedger(createDegree('BA', overrides), 0, years)
  for (let y = 0; y < years; y++) ledger.step(y, steadyEconomy({ year: y }), isa, ctx)
  return ledger
}

describe('StudentLedger', () => {
  it('earns and pays nothing before graduating', () => {
    const ledger = runLedger({ meanEarnings: 60000, earningsStdDev: 0 }, universityTerms(), scriptedContext(0.5), 4)
    expect(ledger.graduated).toBe(false)
    expect(ledger.earningYears).toBe(0)
    expect(ledger.years.every((y) => y.payment.nominal === 0 && !y.employed)).toBe(true)
  })

  it('pays a share of income above the threshold', () => {
    const ledger = runLedger({ meanEarnings: 54300, earningsStdDev: 0 }, universityTerms(), scriptedContext(0.5), 5)
    const y4 = ledger.years[4]
    expect(ledger.graduationYear).toBe(4)
    expect(y4.employed).toBe(true)
    expect(y4.earnings.nominal).toBe(54300)
    expect(y4.payment.nominal).toBeCloseTo(3822, 8)
    expect(y4.fee.nominal).toBeCloseTo(573.3, 8)
    expect(ledger.capStatus).toBe('noCap')
  })

  it('truncates the capping payment so the total lands on the cap', () => {
    const ledger = runLedger({ meanEarnings: 200000, earningsStdDev: 0 }, universityTerms(), scriptedContext(0.5))
    expect(ledger.years[4].payment.nominal).toBeCloseTo(24220, 8)
    expect(ledger.years[5].payment.nominal).toBeCloseTo(25340, 8)
    expect(ledger.years[6].payment.nominal).toBeCloseTo(22940, 8)
    expect(ledger.years[7].payment.nominal).toBe(0)
    expect(ledger.total.nominal).toBe(72500)
    expect(ledger.capAtHit).toBe(72500)
    expect(ledger.capStatus).toBe('paymentCap')
    expect(ledger.active).toBe(false)
  })

  it('stops after the years cap', () => {
    const ledger = runLedger({ meanEarnings: 30000, earningsStdDev: 0 }, universityTerms({ yearsCap: 2 }), scriptedContext(0.5))
    expect(ledger.years[4].payment.nominal).toBeCloseTo(420, 8)
    expect(ledger.years[5].payment.nominal).toBeCloseTo(588, 8)
    expect(ledger.years[6].payment.nominal).toBe(0)
    expect(ledger.total.nominal).toBeCloseTo(1008, 8)
    expect(ledger.capStatus).toBe('yearsCap')
  })

  it('never pays when employment is impossible', () => {
    const ledger = runLedger({ employmentFriction: 1 }, universityTerms({ feeMethod: 'investment-indexed' }), scriptedContext(0.5, 0))
    expect(ledger.total).toEqual({ nominal: 0, real: 0 })
    expect(ledger.employedYears).toBe(0)
    expect(ledger.years.every((y) => y.fee.nominal === 0)).toBe(true)
    expect(ledger.capStatus).toBe('noCap')
  })

  it('sends a graduate home at the home earnings level', () => {
    const ledger = runLedger({ homeProb: 1 }, universityTerms(), scriptedContext(0.5, 0), 5)
    expect(ledger.returnedHome).toBe(true)
    expect(ledger.years[4].earnings.nominal).toBe(2600)
    expect(ledger.total.nominal).toBe(0)
  })

  it('lets a leaver keep history but stop stepping', () => {
    const ledger = runLedger({ meanEarnings: 40000, earningsStdDev: 0, leaveLaborForceProb: 1 }, universityTerms(), scriptedContext(0.5))
    expect(ledger.leftLaborForce).toBe(true)
    expect(ledger.years[4].payment.nominal).toBeCloseTo(1820, 8)
    expect(ledger.years[5].payment.nominal).toBe(0)
    expect(ledger.earningYears).toBe(1)
  })

  it('reports real amounts deflated by the price level', () => {
    const ledger = new StudentLedger(createDegree('BA', { meanEarnings: 54300, earningsStdDev: 0 }), 0, 5)
    ledger.step(4, steadyEconomy({ year: 4, priceLevel: 1.1 }), universityTerms(), scriptedContext(0.5))
    const y4 = ledger.years[4]
    expect(y4.earnings.nominal).toBeCloseTo(59730, 8)
    expect(y4.earnings.real).toBeCloseTo(54300, 8)
    expect(y4.payment.nominal).toBeCloseTo(4582.2, 8)
    expect(y4.payment.real).toBeCloseTo(4582.2 / 1.1, 8)
  })
})

describe('StudentLedger on the informal track', () => {
  it('earns from year 0 and halves income in a year at home', () => {
    const ledger = new StudentLedger(createDegree('NA', { earningsStdDev: 0 }), 0, 3)
    ledger.step(0, steadyEconomy(), universityTerms(), scriptedContext(0.5))
    expect(ledger.graduationYear).toBeNull()
    expect(ledger.graduated).toBe(false)
    expect(ledger.returnedHome).toBe(true)
    expect(ledger.years[0].earnings.nominal).toBe(1100)
    expect(ledger.years[0].payment.nominal).toBe(0)
  })
})

describe('investment-indexed fees', () => {
  const isa = universityTerms({ feeMethod: 'investment-indexed' })

  it('charges a price-indexed slice while the graduate is in good standing', () => {
    const ledger = new StudentLedger(createDegree('BA', { meanEarnings: 54300, earningsStdDev: 0 }), 0, 5)
    ledger.step(4, steadyEconomy({ year: 4, priceLevel: 1.1 }), isa, scriptedContext(0.5))
    expect(ledger.years[4].fee.real).toBeCloseTo(290, 8)
    expect(ledger.years[4].fee.nominal).toBeCloseTo(319, 8)
  })

  it('stops for good after an unemployed year', () => {
    const ledger = new StudentLedger(createDegree('BA', { meanEarnings: 54300, earningsStdDev: 0 }), 0, 6)
    // year 4: home draw, unemployed, leave draw; year 5: employed, leave draw
    const ctx = scriptedContext([0.5, 0.99, 0.5, 0.5, 0.5])
    ledger.step(4, steadyEconomy({ year: 4 }), isa, ctx)
    ledger.step(5, steadyEconomy({ year: 5 }), isa, ctx)
    expect(ledger.years[4].employed).toBe(false)
    expect(ledger.years[5].employed).toBe(true)
    expect(ledger.years[5].payment.nominal).toBeGreaterThan(0)
    expect(ledger.years[5].fee).toEqual({ nominal: 0, real: 0 })
  })

  it('still charges in the last year the years cap allows', () => {
    const ledger = runLedger({ meanEarnings: 30000, earningsStdDev: 0 }, universityTerms({ ...isa, yearsCap: 2 }), scriptedContext(0.5), 8)
    expect(ledger.years[4].payment.nominal).toBeCloseTo(420, 8)
    expect(ledger.years[5].payment.nominal).toBeCloseTo(588, 8)
    expect(ledger.capStatus).toBe('yearsCap')
    expect(ledger.years.map((y) => Math.round(y.fee.real))).toEqual([0, 0, 0, 0, 290, 290, 0, 0])
  })

  it('skips the fee in the year the payment cap is hit', () => {
    const ledger = runLedger({ meanEarnings: 200000, earningsStdDev: 0 }, isa, scriptedContext(0.5), 8)
    expect(ledger.capStatus).toBe('paymentCap')
    expect(ledger.years.map((y) => Math.round(y.fee.real))).toEqual([0, 0, 0, 0, 290, 290, 0, 0])
  })
})

