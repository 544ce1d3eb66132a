import type { IsaTerms } from '../types/engine'
import type { StudentLedger } from './student'

const TOLERANCE = 1e-6

export function checkLedgerInvariants(ledgers: StudentLedger[], isa: IsaTerms, capLimit: number): string[] {
  const errors: string[] = []

  ledgers.forEach((s, i) => {
    const label = `student ${i} (${s.degree.code})`

    if (s.total.nominal < -TOLERANCE || s.total.real < -TOLERANCE) {
      errors.push(`${label}: negative cumulative payment ${s.total.nominal}`)
    }
    if (s.total.nominal > capLimit + TOLERANCE) {
      errors.push(`${label}: cumulative payment ${s.total.nominal} exceeds cap ${capLimit}`)
    }
    if (s.hitPaymentCap && s.hitYearsCap) {
      errors.push(`${label}: marked as hitting both the payment cap and the years cap`)
    }
    if (s.hitPaymentCap && (s.capAtHit == null || Math.abs(s.total.nominal - s.capAtHit) > TOLERANCE)) {
      errors.push(`${label}: hit payment cap but paid ${s.total.nominal} against cap ${s.capAtHit}`)
    }

    const negative = s.years.filter((y) => y.payment.nominal < 0 || y.payment.real < 0)
    negative.forEach((y) => errors.push(`${label}: negative payment in year ${y.year}`))

    const paidYears = s.years.filter((y) => y.payment.nominal > 0).length
    if (paidYears > isa.yearsCap) {
      errors.push(`${label}: paid in ${paidYears} years, more than the cap of ${isa.yearsCap}`)
    }
    if (s.hitYearsCap && paidYears !== isa.yearsCap) {
      errors.push(`${label}: hit years cap after ${paidYears} paying years`)
    }

    const sum = s.years.reduce((acc, y) => acc + y.payment.nominal, 0)
    if (Math.abs(sum - s.total.nominal) > TOLERANCE * Math.max(1, s.total.nominal)) {
      errors.push(`${label}: yearly payments sum to ${sum} but cumulative is ${s.total.nominal}`)
    }
  })

  return errors
}
