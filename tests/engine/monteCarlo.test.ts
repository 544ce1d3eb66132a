import { describe, expect, it, vi } from 'vitest'
import { ConfigurationError, SimulationCancelled } from '../../src/engine/errors'
import { paymentDuration, runMonteCarlo, runMonteCarloAsync } from '../../src/engine/monteCarlo'
import { resolveSimulationConfig } from '../../src/engine/scenarios'
import { describeSummary, simulate } from '../../src/engine/sim'
import type { SimulationRequest } from '../../src/types/schema'

const uganda: SimulationRequest = { programType: 'Uganda', scenario: 'baseline', numStudents: 100, numSims: 50, seed: 42 }

describe('simulate', () => {
  it('reproduces the same summary for the same seed', () => {
    const a = simulate(uganda)
    const b = simulate(uganda)
    expect(b.summary).toEqual(a.summary)
    expect(b.students).toEqual(a.students)
  })

  it('differs across seeds', () => {
    const a = simulate({ ...uganda, numSims: 5, seed: 1 })
    const b = simulate({ ...uganda, numSims: 5, seed: 2 })
    expect(a.summary.averageTotalPayment.nominal).not.toBe(b.summary.averageTotalPayment.nominal)
  })

  it('keeps every student within the cap in every run', () => {
    const config = resolveSimulationConfig({ ...uganda, numSims: 10 })
    const result = runMonteCarlo(config, { keepStudentSeries: 10 })
    expect(result.students).toHaveLength(10)
    for (const { students } of result.students) {
      for (const s of students) {
        expect(s.total.nominal).toBeLessThanOrEqual(72500 + 1e-6)
        if (s.capStatus === 'paymentCap') expect(s.total.nominal).toBeCloseTo(72500, 6)
        if (s.capStatus === 'yearsCap') expect(s.years.filter((y) => y.payment.nominal > 0)).toHaveLength(10)
      }
    }
  })

  it('tallies exactly one cap status per student', () => {
    const { summary } = simulate({ ...uganda, numSims: 10 })
    const { paymentCap, yearsCap, noCap } = summary.caps.counts
    expect(paymentCap + yearsCap + noCap).toBe(10 * 100)
    expect(summary.caps.pct.paymentCap + summary.caps.pct.yearsCap + summary.caps.pct.noCap).toBeCloseTo(1, 12)
  })

  it('keeps the first run of student ledgers by default', () => {
    const result = simulate({ ...uganda, numSims: 3 })
    expect(result.students.map((s) => s.runIndex)).toEqual([0])
    expect(result.runs.map((r) => r.seed)).toEqual([42, 43, 44])
  })

  it('echoes the degree mix against what was assigned', () => {
    const { summary } = simulate({ ...uganda, numSims: 20 })
    expect(summary.degreeDistribution.map((d) => d.code)).toEqual(['BA', 'MA', 'VOC', 'NA'])
    const expected = [43, 23, 25, 9]
    summary.degreeDistribution.forEach((d, i) => expect(d.expectedCount).toBeCloseTo(expected[i], 9))
    const assigned = summary.degreeDistribution.reduce((s, d) => s + d.meanAssigned, 0)
    expect(assigned).toBeCloseTo(100, 9)
  })

  it('leaves an informal-only cohort paying nothing in nearly every run', () => {
    const result = simulate({ programType: 'University', scenario: 'custom', degreeMix: { NA: 100 }, numStudents: 1, numSims: 200, seed: 7 })
    const unpaid = result.runs.filter((r) => r.totalPayment.nominal < 1).length
    expect(unpaid / result.runs.length).toBeGreaterThanOrEqual(0.75)
  })

  it('returns zero payments and an undefined IRR when nobody can find work', () => {
    const blocked = { employmentFriction: 1 }
    const result = simulate({
      programType: 'University',
      numStudents: 1,
      numSims: 1,
      seed: 3,
      degreeOverrides: { BA: blocked, MA: blocked, VOC: blocked, NA: blocked }
    })
    expect(result.summary.averageTotalPayment).toEqual({ nominal: 0, real: 0 })
    expect(result.runs[0].irr.total.nominal).toBeNaN()
    expect(result.summary.irr.total.nominal.undefinedRuns).toBe(1)
    expect(result.warnings.map((w) => [w.kind, w.metric])).toEqual([
      ['no-sign-change', 'total.nominal'],
      ['no-sign-change', 'total.real'],
      ['no-sign-change', 'investor.nominal'],
      ['no-sign-change', 'investor.real']
    ])
  })

  it('fails before any run when the cap is below the threshold', () => {
    const onProgress = vi.fn()
    expect(() => simulate({ ...uganda, isa: { threshold: 30000, cap: 20000 } }, { onProgress })).toThrow(ConfigurationError)
    expect(onProgress).not.toHaveBeenCalled()
  })

  it('lowers the IRR as the price per student rises', () => {
    const medians = [20000, 29000, 40000].map(
      (pricePerStudent) => simulate({ ...uganda, numSims: 10, isa: { pricePerStudent } }).summary.irr.total.nominal.p50
    )
    expect(medians[1]).toBeLessThan(medians[0])
    expect(medians[2]).toBeLessThan(medians[1])
  })

  it('nets the investment-indexed fee out of investor payments', () => {
    const { runs, summary } = simulate({ ...uganda, numSims: 5, feeMethod: 'investment-indexed' })
    expect(summary.averageFeePayment.nominal).toBeGreaterThan(0)
    for (const r of runs) {
      expect(r.investorPayment.nominal).toBeCloseTo(r.totalPayment.nominal - r.feePayment.nominal, 6)
    }
  })

  it('describes the summary in one line per figure', () => {
    const lines = describeSummary(simulate({ ...uganda, numSims: 2 }).summary)
    expect(lines[0]).toBe('2 runs • investment $2,900,000')
    expect(lines).toHaveLength(10)
  })
})

describe('cancellation and progress', () => {
  it('stops between runs once cancellation is requested', () => {
    const config = resolveSimulationConfig(uganda)
    let done = 0
    const run = () =>
      runMonteCarlo(config, {
        onProgress: (d) => (done = d),
        shouldCancel: () => done >= 3
      })
    expect(run).toThrow(SimulationCancelled)
    expect(done).toBe(3)
  })

  it('reports progress after every run', () => {
    const onProgress = vi.fn()
    runMonteCarlo(resolveSimulationConfig({ ...uganda, numSims: 4 }), { onProgress })
    expect(onProgress.mock.calls).toEqual([
      [1, 4],
      [2, 4],
      [3, 4],
      [4, 4]
    ])
  })

  it('produces the same result when yielding between runs', async () => {
    const config = resolveSimulationConfig({ ...uganda, numSims: 5 })
    const asyncResult = await runMonteCarloAsync(config)
    expect(asyncResult.summary).toEqual(runMonteCarlo(config).summary)
  })
})

describe('paymentDuration', () => {
  it('weights each payment year by when it lands', () => {
    expect(paymentDuration([{ nominal: 0, real: 0 }, { nominal: 100, real: 100 }, { nominal: 100, real: 100 }])).toBe(2.5)
    expect(paymentDuration([{ nominal: 0, real: 0 }])).toBeNaN()
  })
})
