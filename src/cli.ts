import { parseArgs } from 'node:util'
import type { Money } from './types/engine'
import type { SimulationRequest } from './types/schema'
import { ConfigurationError } from './engine/errors'
import { describeSummary, simulate } from './engine/sim'

const USAGE = `Usage: isa-sim [options]
  --program <name>        University | TVET | Labor (default University)
  --scenario <name>       baseline | conservative | optimistic (default baseline)
  --students <n>          students per cohort (default 100)
  --sims <n>              Monte Carlo runs (default 100)
  --seed <n>              master seed for reproducible runs
  --graduation-delay      draw graduation delays
  --plot                  print mean yearly payments as a bar chart
  --help`

function toNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw == null) return undefined
  const v = Number(raw)
  if (!Number.isFinite(v)) throw new ConfigurationError(`--${flag} must be a number (got '${raw}')`)
  return v
}

export function parseCliArgs(argv: string[]): { request: SimulationRequest; plot: boolean; help: boolean } {
  const { values } = parseArgs({
    args: argv,
    options: {
      program: { type: 'string' },
      scenario: { type: 'string' },
      students: { type: 'string' },
      sims: { type: 'string' },
      seed: { type: 'string' },
      plot: { type: 'boolean', default: false },
      'graduation-delay': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  })
  const request: SimulationRequest = {
    programType: values.program ?? 'University',
    scenario: values.scenario ?? 'baseline',
    numStudents: toNumber('students', values.students) ?? 100,
    numSims: toNumber('sims', values.sims) ?? 100,
    seed: toNumber('seed', values.seed),
    graduationDelay: values['graduation-delay'] ?? false
  }
  return { request, plot: values.plot ?? false, help: values.help ?? false }
}

// One bar per year, scaled to the largest mean payment
export function renderPaymentBars(series: readonly Money[], width = 40): string[] {
  const max = series.reduce((m, p) => Math.max(m, p.nominal), 0)
  return series.map((p, i) => {
    const len = max > 0 ? Math.round((p.nominal / max) * width) : 0
    const label = `Y${String(i + 1).padStart(2, '0')}`
    return `${label} ${'#'.repeat(len).padEnd(width)} ${Math.round(p.nominal).toLocaleString('en-US')}`
  })
}

export function main(argv: string[]): number {
  try {
    const parsed = parseCliArgs(argv)
    if (parsed.help) {
      console.log(USAGE)
      return 0
    }
    const result = simulate(parsed.request)
    const { config, summary } = result
    console.log(`${config.programType} / ${config.scenario} • ${config.numStudents} students`)
    describeSummary(summary).forEach((line) => console.log(line))
    if (result.warnings.length) console.log(`${result.warnings.length} numerical warning(s): IRR undefined in some runs`)
    if (parsed.plot) {
      console.log('\nMean yearly payments (nominal)')
      renderPaymentBars(summary.paymentByYear).forEach((line) => console.log(line))
    }
    return 0
  } catch (error) {
    if (error instanceof ConfigurationError) {
      error.issues.forEach((issue) => console.error(`error: ${issue}`))
      return 2
    }
    if (error instanceof TypeError && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS')) {
      console.error(error.message)
      console.error(USAGE)
      return 2
    }
    throw error
  }
}
