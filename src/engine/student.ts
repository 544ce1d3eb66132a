import type { CapStatus, DegreeProgram, EconomySnapshot, IsaTerms, Money, StudentSeries, StudentYear } from '../types/engine'
import { HOME_EARNINGS, HOME_EARNINGS_FACTOR } from './degrees'
import { money, studentYearFee } from './fees'
import { bernoulli, normal, type RandomContext } from './random'

const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v))

const emptyYear = (year: number): StudentYear => ({
  year,
  employed: false,
  earnings: { nominal: 0, real: 0 },
  payment: { nominal: 0, real: 0 },
  fee: { nominal: 0, real: 0 }
})

/**
 * One student's state across a cohort run. Mutated by `step` once per simulated year,
 * read-only after the run.
 */
export class StudentLedger {
  readonly years: StudentYear[]
  readonly total: Money = { nominal: 0, real: 0 }
  graduated = false
  returnedHome = false
  leftLaborForce = false
  hitPaymentCap = false
  hitYearsCap = false
  paymentYears = 0
  earningYears = 0
  employedYears = 0
  // cap level in force when the payment cap was reached
  capAtHit: number | null = null
  private earningsLevel: number | null = null
  private servicing = true

  constructor(readonly degree: DegreeProgram, readonly graduationDelay: number, horizonYears: number) {
    this.years = Array.from({ length: horizonYears }, (_, i) => emptyYear(i))
  }

  get informal(): boolean {
    return this.degree.completionClass === 'none'
  }

  get graduationYear(): number | null {
    return this.informal ? null : this.degree.yearsToComplete + this.graduationDelay
  }

  get active(): boolean {
    return !this.hitPaymentCap && !this.hitYearsCap && !this.leftLaborForce
  }

  get capStatus(): CapStatus {
    if (this.hitPaymentCap) return 'paymentCap'
    if (this.hitYearsCap) return 'yearsCap'
    return 'noCap'
  }

  earnsIn(year: number): boolean {
    const g = this.graduationYear
    return g == null || year >= g
  }

  step(year: number, econ: EconomySnapshot, isa: IsaTerms, ctx: RandomContext): StudentYear {
    const rec = this.years[year]
    if (!this.active || !this.earnsIn(year)) return rec

    if (this.earningsLevel == null) this.drawEarningsLevel(ctx)
    const level = this.earningsLevel ?? 0
    this.earningYears += 1

    const unemployment = clamp(econ.unemployment + this.degree.employmentFriction, 0, 1)
    rec.employed = bernoulli(ctx, 1 - unemployment)

    // the final allowed paying year still owes the fee; the payment-cap year does not
    const withinYears = !this.hitYearsCap
    if (rec.employed) {
      this.employedYears += 1
      const experience = year - (this.graduationYear ?? 0)
      let nominal = level * econ.priceLevel * Math.pow(1 + this.degree.experienceGrowth, experience)
      if (this.informal && bernoulli(ctx, this.degree.homeProb)) {
        this.returnedHome = true
        nominal *= HOME_EARNINGS_FACTOR
      }
      rec.earnings = money(nominal, econ.priceLevel)
      this.collect(rec, nominal, econ, isa)
    } else if (!this.informal) {
      this.servicing = false
    }

    rec.fee = studentYearFee(isa, {
      payment: rec.payment,
      priceLevel: econ.priceLevel,
      servicing: this.graduated && rec.employed && this.servicing && !this.hitPaymentCap && withinYears
    })

    if (this.active && bernoulli(ctx, this.degree.leaveLaborForceProb)) this.leftLaborForce = true
    return rec
  }

  private drawEarningsLevel(ctx: RandomContext) {
    if (this.informal) {
      this.earningsLevel = Math.max(0, normal(ctx, this.degree.meanEarnings, this.degree.earningsStdDev))
      return
    }
    this.graduated = true
    this.returnedHome = bernoulli(ctx, this.degree.homeProb)
    this.earningsLevel = this.returnedHome
      ? Math.max(0, normal(ctx, HOME_EARNINGS.mean, HOME_EARNINGS.stdDev))
      : Math.max(0, normal(ctx, this.degree.meanEarnings, this.degree.earningsStdDev))
  }

  private collect(rec: StudentYear, earnings: number, econ: EconomySnapshot, isa: IsaTerms) {
    if (earnings <= econ.isaThreshold) return
    const owed = isa.percentage * (earnings - econ.isaThreshold)
    if (owed <= 0) return
    const remaining = econ.isaCap - this.total.nominal
    let paid: number
    if (owed >= remaining) {
      paid = remaining
      this.total.nominal = econ.isaCap
      this.hitPaymentCap = true
      this.capAtHit = econ.isaCap
    } else {
      paid = owed
      this.total.nominal += owed
    }
    rec.payment = money(paid, econ.priceLevel)
    this.total.real += rec.payment.real
    this.paymentYears += 1
    if (!this.hitPaymentCap && this.paymentYears >= isa.yearsCap) this.hitYearsCap = true
  }

  toSeries(): StudentSeries {
    return {
      degree: this.degree.code,
      graduationYear: this.graduationYear,
      returnedHome: this.returnedHome,
      leftLaborForce: this.leftLaborForce,
      capStatus: this.capStatus,
      total: { ...this.total },
      years: this.years.map((y) => ({
        ...y,
        earnings: { ...y.earnings },
        payment: { ...y.payment },
        fee: { ...y.fee }
      }))
    }
  }
}
