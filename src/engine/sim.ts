import type { IrrStats, MonteSummary, SimulationResult } from '../types/engine'
import type { SimulationRequest } from '../types/schema'
import { runMonteCarlo, runMonteCarloAsync, type MonteCarloOptions } from './monteCarlo'
import { resolveSimulationConfig } from './scenarios'

export type SimulateOptions = MonteCarloOptions

/**
 * Resolves the request into a validated config and runs the Monte Carlo. Throws
 * ConfigurationError before any run starts; never returns a partial result.
 */
export function simulate(request: SimulationRequest, options: SimulateOptions = {}): SimulationResult {
  const config = resolveSimulationConfig(request)
  return runMonteCarlo(config, options)
}

export async function simulateAsync(request: SimulationRequest, options: SimulateOptions = {}): Promise<SimulationResult> {
  const config = resolveSimulationConfig(request)
  return runMonteCarloAsync(config, options)
}

const pct = (v: number) => (Number.isFinite(v) ? `${(v * 100).toFixed(1)}%` : 'n/a')
const usd = (v: number) => `$${Math.round(v).toLocaleString('en-US')}`

function irrLine(label: string, s: IrrStats): string {
  const undef = s.undefinedRuns ? ` • ${s.undefinedRuns} undefined` : ''
  return `${label}: mean ${pct(s.mean)} • p10 ${pct(s.p10)} • p50 ${pct(s.p50)} • p90 ${pct(s.p90)}${undef}`
}

export function describeSummary(summary: MonteSummary): string[] {
  const { irr, caps } = summary
  return [
    `${summary.runs.toLocaleString('en-US')} runs • investment ${usd(summary.totalInvestment)}`,
    irrLine('IRR (nominal)', irr.total.nominal),
    irrLine('IRR (real)', irr.total.real),
    irrLine('Investor IRR (nominal)', irr.investor.nominal),
    irrLine('Investor IRR (real)', irr.investor.real),
    `Avg total payment ${usd(summary.averageTotalPayment.nominal)} nominal • ${usd(summary.averageTotalPayment.real)} real`,
    `Avg investor payment ${usd(summary.averageInvestorPayment.nominal)} • fees ${usd(summary.averageFeePayment.nominal)}`,
    `Employment ${pct(summary.employmentRate)} • ever employed ${pct(summary.everEmployedRate)} • repaying ${pct(summary.repaymentRate)}`,
    `Caps: payment ${pct(caps.pct.paymentCap)} • years ${pct(caps.pct.yearsCap)} • none ${pct(caps.pct.noCap)}`,
    `Duration ${Number.isFinite(summary.averageDurationYears) ? summary.averageDurationYears.toFixed(2) : 'n/a'} years`
  ]
}
