import { setImmediate } from 'node:timers/promises'
import type {
  CapBreakdown,
  CapStatus,
  CohortRun,
  DegreeCode,
  DegreeEcho,
  Money,
  MonteSummary,
  NumericalWarning,
  RunStats,
  SimulationConfig,
  SimulationResult
} from '../types/engine'
import { simulateCohort } from './cohort'
import { SimulationCancelled } from './errors'
import { addMoney } from './fees'
import { buildCashFlows, solveIrr } from './irr'
import { mean, quantile, sortedCopy, summarizeIrr } from './quantile'
import { createRandomContext, offsetSeed } from './random'
import type { StudentLedger } from './student'

export interface MonteCarloOptions {
  // runs whose full student ledgers are returned, counted from run 0
  keepStudentSeries?: number
  shouldCancel?: () => boolean
  onProgress?: (done: number, total: number) => void
}

const CAP_STATUSES: CapStatus[] = ['paymentCap', 'yearsCap', 'noCap']
const emptyCaps = (): CapBreakdown => ({ paymentCap: 0, yearsCap: 0, noCap: 0 })
const sumMoney = (xs: readonly Money[]): Money => xs.reduce(addMoney, { nominal: 0, real: 0 })
const ratio = (num: number, den: number) => (den > 0 ? num / den : 0)

function irrFor(flows: number[], metric: string, runIndex: number, warnings: NumericalWarning[]): number {
  const out = solveIrr(flows)
  if (out.ok) return out.rate
  warnings.push({ kind: out.reason, metric, runIndex, message: `IRR undefined for ${metric} in run ${runIndex} (${out.reason})` })
  return NaN
}

// Σ t·p_t / Σ p_t over real payments, with payment year i landing at t = i + 1
export function paymentDuration(paymentsByYear: readonly Money[]): number {
  let weighted = 0
  let total = 0
  paymentsByYear.forEach((p, i) => {
    weighted += (i + 1) * p.real
    total += p.real
  })
  return total > 0 ? weighted / total : NaN
}

export function summarizeRun(
  config: SimulationConfig,
  runIndex: number,
  seed: number | undefined,
  run: CohortRun,
  students: StudentLedger[],
  warnings: NumericalWarning[]
): RunStats {
  const n = students.length
  const caps = emptyCaps()
  const capTotals = emptyCaps()
  const degreeCounts: Partial<Record<DegreeCode, number>> = {}
  let employedYears = 0
  let earningYears = 0
  for (const s of students) {
    caps[s.capStatus] += 1
    capTotals[s.capStatus] += s.total.real
    degreeCounts[s.degree.code] = (degreeCounts[s.degree.code] ?? 0) + 1
    employedYears += s.employedYears
    earningYears += s.earningYears
  }
  const avgRepaymentByCap = emptyCaps()
  CAP_STATUSES.forEach((k) => (avgRepaymentByCap[k] = ratio(capTotals[k], caps[k])))

  const investment = config.numStudents * config.isa.pricePerStudent
  const flows = (series: Money[], basis: keyof Money) => buildCashFlows(investment, series.map((m) => m[basis]))

  return {
    runIndex,
    seed,
    employmentRate: ratio(employedYears, earningYears),
    everEmployedRate: ratio(students.filter((s) => s.employedYears > 0).length, n),
    repaymentRate: ratio(students.filter((s) => s.total.nominal > 0).length, n),
    caps,
    avgRepaymentByCap,
    totalPayment: sumMoney(run.paymentsByYear),
    investorPayment: sumMoney(run.investorByYear),
    feePayment: sumMoney(run.feesByYear),
    studentTotals: students.map((s) => ({ ...s.total })),
    degreeCounts,
    irr: {
      total: {
        nominal: irrFor(flows(run.paymentsByYear, 'nominal'), 'total.nominal', runIndex, warnings),
        real: irrFor(flows(run.paymentsByYear, 'real'), 'total.real', runIndex, warnings)
      },
      investor: {
        nominal: irrFor(flows(run.investorByYear, 'nominal'), 'investor.nominal', runIndex, warnings),
        real: irrFor(flows(run.investorByYear, 'real'), 'investor.real', runIndex, warnings)
      }
    },
    paymentsByYear: run.paymentsByYear,
    investorByYear: run.investorByYear,
    feesByYear: run.feesByYear,
    activeByYear: run.activeByYear,
    durationYears: paymentDuration(run.paymentsByYear)
  }
}

function meanMoney(xs: readonly Money[]): Money {
  return { nominal: mean(xs.map((x) => x.nominal)), real: mean(xs.map((x) => x.real)) }
}

function meanSeries(rows: readonly Money[][], years: number): Money[] {
  return Array.from({ length: years }, (_, i) => meanMoney(rows.map((r) => r[i])))
}

export function summarize(config: SimulationConfig, runs: readonly RunStats[]): MonteSummary {
  const counts = emptyCaps()
  const capTotals = emptyCaps()
  for (const r of runs) {
    CAP_STATUSES.forEach((k) => {
      counts[k] += r.caps[k]
      capTotals[k] += r.avgRepaymentByCap[k] * r.caps[k]
    })
  }
  const enrolled = runs.length * config.numStudents
  const pct = emptyCaps()
  const avgRepayment = emptyCaps()
  CAP_STATUSES.forEach((k) => {
    pct[k] = ratio(counts[k], enrolled)
    avgRepayment[k] = ratio(capTotals[k], counts[k])
  })

  const realTotals = sortedCopy(runs.map((r) => r.totalPayment.real))
  const durations = runs.map((r) => r.durationYears).filter((d) => Number.isFinite(d))
  const years = config.horizonYears

  const degreeDistribution: DegreeEcho[] = config.degreeMix.map(({ degree, probability }) => ({
    code: degree.code,
    name: degree.name,
    probability,
    expectedCount: probability * config.numStudents,
    meanAssigned: mean(runs.map((r) => r.degreeCounts[degree.code] ?? 0))
  }))

  return {
    runs: runs.length,
    totalInvestment: config.numStudents * config.isa.pricePerStudent,
    irr: {
      total: {
        nominal: summarizeIrr(runs.map((r) => r.irr.total.nominal)),
        real: summarizeIrr(runs.map((r) => r.irr.total.real))
      },
      investor: {
        nominal: summarizeIrr(runs.map((r) => r.irr.investor.nominal)),
        real: summarizeIrr(runs.map((r) => r.irr.investor.real))
      }
    },
    averageTotalPayment: meanMoney(runs.map((r) => r.totalPayment)),
    averageInvestorPayment: meanMoney(runs.map((r) => r.investorPayment)),
    averageFeePayment: meanMoney(runs.map((r) => r.feePayment)),
    paymentQuantiles: {
      p0: quantile(realTotals, 0),
      p25: quantile(realTotals, 0.25),
      p50: quantile(realTotals, 0.5),
      p75: quantile(realTotals, 0.75),
      p100: quantile(realTotals, 1)
    },
    averageDurationYears: mean(durations),
    employmentRate: mean(runs.map((r) => r.employmentRate)),
    everEmployedRate: mean(runs.map((r) => r.everEmployedRate)),
    repaymentRate: mean(runs.map((r) => r.repaymentRate)),
    caps: { counts, pct, avgRepayment },
    paymentByYear: meanSeries(runs.map((r) => r.paymentsByYear), years),
    investorPaymentByYear: meanSeries(runs.map((r) => r.investorByYear), years),
    feePaymentByYear: meanSeries(runs.map((r) => r.feesByYear), years),
    activeStudentsByYear: Array.from({ length: years }, (_, i) => mean(runs.map((r) => r.activeByYear[i]))),
    degreeDistribution
  }
}

function createRunner(config: SimulationConfig, opts: MonteCarloOptions) {
  const keep = Math.max(0, opts.keepStudentSeries ?? 1)
  const runs: RunStats[] = []
  const students: SimulationResult['students'] = []
  const warnings: NumericalWarning[] = []

  return {
    next(k: number) {
      if (opts.shouldCancel?.()) throw new SimulationCancelled(k)
      const seed = offsetSeed(config.seed, k)
      const ctx = createRandomContext(seed)
      const { run, students: ledgers } = simulateCohort(config, k, ctx, seed)
      runs.push(summarizeRun(config, k, seed, run, ledgers, warnings))
      if (k < keep) students.push({ runIndex: k, students: ledgers.map((s) => s.toSeries()), economy: run.economy })
      opts.onProgress?.(k + 1, config.numSims)
    },
    result(): SimulationResult {
      return { config, summary: summarize(config, runs), runs, students, warnings }
    }
  }
}

/**
 * Runs `numSims` independent cohorts. Run k draws from its own generator seeded with
 * seed + k, so any single run can be replayed in isolation.
 */
export function runMonteCarlo(config: SimulationConfig, opts: MonteCarloOptions = {}): SimulationResult {
  const runner = createRunner(config, opts)
  for (let k = 0; k < config.numSims; k++) runner.next(k)
  return runner.result()
}

// Same runs, yielding to the event loop between them so `shouldCancel` can observe I/O
export async function runMonteCarloAsync(config: SimulationConfig, opts: MonteCarloOptions = {}): Promise<SimulationResult> {
  const runner = createRunner(config, opts)
  for (let k = 0; k < config.numSims; k++) {
    await setImmediate()
    runner.next(k)
  }
  return runner.result()
}
