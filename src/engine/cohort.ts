import type { CohortRun, EconomySnapshot, Money, SimulationConfig } from '../types/engine'
import { drawGraduationDelay } from './degrees'
import { EconomicEnvironment } from './economy'
import { InternalInvariantViolation } from './errors'
import { addMoney, subMoney } from './fees'
import { checkLedgerInvariants } from './invariants'
import { categorical, type RandomContext } from './random'
import { StudentLedger } from './student'

export interface CohortOutcome {
  run: CohortRun
  students: StudentLedger[]
}

function enrol(config: SimulationConfig, ctx: RandomContext): StudentLedger[] {
  const weights = config.degreeMix.map((s) => s.probability)
  const students: StudentLedger[] = []
  for (let i = 0; i < config.numStudents; i++) {
    const { degree } = config.degreeMix[categorical(ctx, weights)]
    const delay = config.graduationDelay ? drawGraduationDelay(degree.completionClass, ctx) : 0
    students.push(new StudentLedger(degree, delay, config.horizonYears))
  }
  return students
}

const zeros = (n: number): Money[] => Array.from({ length: n }, () => ({ nominal: 0, real: 0 }))

/**
 * One cohort under one economic path. Year 0 uses the starting economy; every later
 * year advances it once before any student is processed.
 */
export function simulateCohort(config: SimulationConfig, runIndex: number, ctx: RandomContext, seed?: number): CohortOutcome {
  const { isa, horizonYears } = config
  const env = new EconomicEnvironment(
    config.economy,
    { threshold: isa.threshold, cap: isa.cap, indexToInflation: isa.indexToInflation },
    ctx
  )
  const students = enrol(config, ctx)

  const paymentsByYear = zeros(horizonYears)
  const feesByYear = zeros(horizonYears)
  const activeByYear = new Array<number>(horizonYears).fill(0)
  const economy: EconomySnapshot[] = []

  for (let year = 0; year < horizonYears; year++) {
    const econ = year === 0 ? env.snapshot() : env.advance()
    economy.push(econ)
    for (const s of students) {
      if (!s.active) continue
      activeByYear[year] += 1
      const rec = s.step(year, econ, isa, ctx)
      paymentsByYear[year] = addMoney(paymentsByYear[year], rec.payment)
      feesByYear[year] = addMoney(feesByYear[year], rec.fee)
    }
  }

  const capLimit = economy.reduce((m, e) => Math.max(m, e.isaCap), 0)
  const violations = checkLedgerInvariants(students, isa, capLimit)
  if (violations.length) throw new InternalInvariantViolation(runIndex, violations)

  return {
    run: {
      runIndex,
      seed,
      paymentsByYear,
      feesByYear,
      investorByYear: paymentsByYear.map((p, i) => subMoney(p, feesByYear[i])),
      activeByYear,
      economy
    },
    students
  }
}
