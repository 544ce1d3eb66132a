import type {
  DegreeCode,
  DegreeOverrides,
  DegreeShare,
  FeeMethod,
  IsaTerms,
  ProgramType,
  ScenarioName,
  SimulationConfig
} from '../types/engine'
import type { SimulationRequest } from '../types/schema'
import { DEGREE_CODES, createDegree, isDegreeCode, validateDegree } from './degrees'
import { INFLATION_BOUNDS, UNEMPLOYMENT_BOUNDS } from './economy'
import { ConfigurationError } from './errors'

export const MIX_TOLERANCE = 1e-6
export const LIMITS = { minCount: 1, maxCount: 1000, maxHorizon: 60 } as const
export const DEFAULT_HORIZON_YEARS = 25
export const DEFAULT_YEARS_CAP = 10
export const DEFAULT_PERFORMANCE_FEE = 0.15
export const DEFAULT_ANNUAL_FEE_RATE = 0.01
// seeds are consumed as uint32
export const MAX_SEED = 0xffffffff
export const DEFAULT_ECONOMY = { initialInflation: 0.02, initialUnemployment: 0.04 } as const

type PresetScenario = Exclude<ScenarioName, 'custom'>
type DegreeMix = Partial<Record<DegreeCode, number>>

export interface ProgramPreset {
  programType: ProgramType
  description: string
  isa: Pick<IsaTerms, 'percentage' | 'threshold' | 'cap' | 'pricePerStudent'>
  scenarios: Record<PresetScenario, { description: string; mix: DegreeMix }>
}

const SCENARIOS: ScenarioName[] = ['baseline', 'conservative', 'optimistic', 'custom']

// Preset mixes are checked once here, when the table is defined
function definePresets(table: Record<ProgramType, ProgramPreset>): Record<ProgramType, ProgramPreset> {
  const issues: string[] = []
  for (const preset of Object.values(table)) {
    for (const [name, s] of Object.entries(preset.scenarios)) {
      const sum = Object.values(s.mix).reduce((acc, p) => acc + (p ?? 0), 0)
      if (Math.abs(sum - 1) > MIX_TOLERANCE) issues.push(`${preset.programType}/${name} mix sums to ${sum}`)
    }
  }
  if (issues.length) throw new ConfigurationError(issues)
  return table
}

export const PROGRAM_PRESETS = definePresets({
  University: {
    programType: 'University',
    description: 'University degrees abroad (bachelor, master, vocational fallback)',
    isa: { percentage: 0.14, threshold: 27000, cap: 72500, pricePerStudent: 29000 },
    scenarios: {
      baseline: { description: 'Standard distribution with balanced degree types.', mix: { BA: 0.43, MA: 0.23, VOC: 0.25, NA: 0.09 } },
      conservative: { description: 'More vocational degrees, fewer advanced degrees.', mix: { BA: 0.3, MA: 0.1, VOC: 0.4, NA: 0.2 } },
      optimistic: { description: 'Mostly bachelor and master degrees with very few dropouts.', mix: { BA: 0.625, MA: 0.325, VOC: 0.025, NA: 0.025 } }
    }
  },
  TVET: {
    programType: 'TVET',
    description: 'Technical and vocational training (nursing, trades)',
    isa: { percentage: 0.12, threshold: 27000, cap: 49950, pricePerStudent: 16650 },
    scenarios: {
      baseline: { description: 'Even nursing and vocational split, 10% no advancement.', mix: { NURSE: 0.45, VOC: 0.45, NA: 0.1 } },
      conservative: { description: 'More vocational than nursing, higher dropout.', mix: { NURSE: 0.25, VOC: 0.6, NA: 0.15 } },
      optimistic: { description: 'No dropouts, more nursing degrees.', mix: { NURSE: 0.6, VOC: 0.4 } }
    }
  },
  Labor: {
    programType: 'Labor',
    description: 'Skilled-trade labor placements',
    isa: { percentage: 0.12, threshold: 27000, cap: 45000, pricePerStudent: 15000 },
    scenarios: {
      baseline: { description: '75% labor placements, 25% no advancement.', mix: { LABOR: 0.75, NA: 0.25 } },
      conservative: { description: '60% labor placements, 40% no advancement.', mix: { LABOR: 0.6, NA: 0.4 } },
      optimistic: { description: '95% labor placements, minimal dropouts.', mix: { LABOR: 0.95, NA: 0.05 } }
    }
  }
})

const PROGRAM_ALIASES: Record<string, ProgramType> = {
  university: 'University',
  uganda: 'University',
  tvet: 'TVET',
  labor: 'Labor',
  labour: 'Labor'
}

export function resolveProgramType(name: string): ProgramType | undefined {
  return PROGRAM_ALIASES[name.trim().toLowerCase()]
}

export function resolveScenarioName(name: string): ScenarioName | undefined {
  const key = name.trim().toLowerCase()
  return SCENARIOS.find((s) => s === key)
}

export interface ScenarioOverrides {
  degreeMix?: DegreeMix // percentages, custom only
  degreeOverrides?: Partial<Record<DegreeCode, DegreeOverrides>>
  homeProbability?: number
  leaveLaborForceProbability?: number
}

export interface ResolvedScenario {
  programType: ProgramType
  scenario: ScenarioName
  degreeMix: DegreeShare[]
  isa: ProgramPreset['isa']
}

function mixFromPercentages(mix: DegreeMix | undefined, issues: string[]): DegreeMix {
  if (!mix) {
    issues.push('custom scenario requires degreeMix percentages')
    return {}
  }
  const out: DegreeMix = {}
  let sum = 0
  for (const [code, pct] of Object.entries(mix)) {
    if (!isDegreeCode(code)) {
      issues.push(`unknown degree code '${code}' in degreeMix`)
      continue
    }
    if (pct == null || !Number.isFinite(pct) || pct < 0) {
      issues.push(`degreeMix.${code} must be a non-negative percentage`)
      continue
    }
    sum += pct
    if (pct > 0) out[code] = pct / 100
  }
  if (Math.abs(sum - 100) > MIX_TOLERANCE * 100) {
    issues.push(`custom degree percentages must sum to 100 (got ${sum})`)
  }
  return out
}

function checkDegreeOverrides(mix: DegreeMix, overrides: ScenarioOverrides, issues: string[]) {
  for (const key of Object.keys(overrides.degreeOverrides ?? {})) {
    if (!isDegreeCode(key)) issues.push(`unknown degree code '${key}' in degreeOverrides`)
    else if (!mix[key]) issues.push(`degreeOverrides.${key} names a degree outside the resolved mix`)
  }
}

function buildDegrees(mix: DegreeMix, overrides: ScenarioOverrides, issues: string[]): DegreeShare[] {
  checkDegreeOverrides(mix, overrides, issues)
  const shares: DegreeShare[] = []
  for (const code of DEGREE_CODES) {
    const p = mix[code]
    if (!p) continue
    const global: { -readonly [K in keyof DegreeOverrides]: DegreeOverrides[K] } = {}
    if (overrides.leaveLaborForceProbability != null) global.leaveLaborForceProb = overrides.leaveLaborForceProbability
    if (overrides.homeProbability != null && code !== 'NA') global.homeProb = overrides.homeProbability
    const degree = createDegree(code, { ...global, ...(overrides.degreeOverrides?.[code] ?? {}) })
    issues.push(...validateDegree(degree))
    shares.push({ degree, probability: p })
  }
  return shares
}

function scenarioIssues(programType: string, scenarioName: string) {
  const issues: string[] = []
  const program = resolveProgramType(programType)
  const scenario = resolveScenarioName(scenarioName)
  if (!program) issues.push(`unknown program type '${programType}'`)
  if (!scenario) issues.push(`unknown scenario '${scenarioName}' (expected ${SCENARIOS.join(', ')})`)
  return { program, scenario, issues }
}

function resolveScenario(programType: string, scenarioName: string, overrides: ScenarioOverrides, issues: string[]): ResolvedScenario | undefined {
  const found = scenarioIssues(programType, scenarioName)
  issues.push(...found.issues)
  if (!found.program || !found.scenario) return undefined
  const preset = PROGRAM_PRESETS[found.program]
  if (found.scenario !== 'custom' && overrides.degreeMix) {
    issues.push(`degreeMix only applies to the custom scenario (got '${found.scenario}')`)
  }
  const mix = found.scenario === 'custom' ? mixFromPercentages(overrides.degreeMix, issues) : preset.scenarios[found.scenario].mix
  return {
    programType: found.program,
    scenario: found.scenario,
    degreeMix: buildDegrees(mix, overrides, issues),
    isa: { ...preset.isa }
  }
}

/**
 * Resolves a program/scenario pair into degree shares and the program's default ISA terms.
 * Throws ConfigurationError with every problem found.
 */
export function buildScenario(programType: string, scenarioName: string, overrides: ScenarioOverrides = {}): ResolvedScenario {
  const issues: string[] = []
  const resolved = resolveScenario(programType, scenarioName, overrides, issues)
  if (!resolved || issues.length) throw new ConfigurationError(issues)
  return resolved
}

const isCount = (v: number) => Number.isInteger(v) && v >= LIMITS.minCount && v <= LIMITS.maxCount

function checkIsa(isa: IsaTerms, issues: string[]) {
  const positive: Array<[string, number]> = [
    ['isa.percentage', isa.percentage],
    ['isa.threshold', isa.threshold],
    ['isa.cap', isa.cap],
    ['isa.pricePerStudent', isa.pricePerStudent]
  ]
  for (const [label, v] of positive) {
    if (!Number.isFinite(v) || v <= 0) issues.push(`${label} must be positive (got ${v})`)
  }
  if (isa.percentage > 1) issues.push(`isa.percentage must be a fraction of income <= 1 (got ${isa.percentage})`)
  if (isa.threshold > isa.cap) issues.push(`isa.threshold (${isa.threshold}) exceeds isa.cap (${isa.cap})`)
  if (!Number.isInteger(isa.yearsCap) || isa.yearsCap < 1) issues.push(`isa.yearsCap must be a positive integer (got ${isa.yearsCap})`)
  if (!Number.isFinite(isa.performanceFeePct) || isa.performanceFeePct < 0 || isa.performanceFeePct > 1) {
    issues.push(`performanceFeePct must be within [0, 1] (got ${isa.performanceFeePct})`)
  }
  if (!Number.isFinite(isa.annualFeeRate) || isa.annualFeeRate < 0 || isa.annualFeeRate > 1) {
    issues.push(`isa.annualFeeRate must be within [0, 1] (got ${isa.annualFeeRate})`)
  }
  const methods: FeeMethod[] = ['performance', 'investment-indexed']
  if (!methods.includes(isa.feeMethod)) issues.push(`unknown fee method '${isa.feeMethod}'`)
}

/**
 * preset -> overrides -> validated config. Nothing random happens before this returns.
 */
export function resolveSimulationConfig(req: SimulationRequest): SimulationConfig {
  const issues: string[] = []
  if (!isCount(req.numStudents)) issues.push(`numStudents must be an integer in [1, 1000] (got ${req.numStudents})`)
  if (!isCount(req.numSims)) issues.push(`numSims must be an integer in [1, 1000] (got ${req.numSims})`)
  const horizonYears = req.horizonYears ?? DEFAULT_HORIZON_YEARS
  if (!Number.isInteger(horizonYears) || horizonYears < 1 || horizonYears > LIMITS.maxHorizon) {
    issues.push(`horizonYears must be an integer in [1, ${LIMITS.maxHorizon}] (got ${horizonYears})`)
  }
  if (req.seed != null && (!Number.isInteger(req.seed) || req.seed < 0 || req.seed > MAX_SEED)) {
    issues.push(`seed must be an integer in [0, ${MAX_SEED}] (got ${req.seed})`)
  }

  const resolved = resolveScenario(req.programType, req.scenario ?? 'baseline', req, issues)

  const isa: IsaTerms = {
    percentage: req.isa?.percentage ?? resolved?.isa.percentage ?? NaN,
    threshold: req.isa?.threshold ?? resolved?.isa.threshold ?? NaN,
    cap: req.isa?.cap ?? resolved?.isa.cap ?? NaN,
    pricePerStudent: req.isa?.pricePerStudent ?? resolved?.isa.pricePerStudent ?? NaN,
    yearsCap: req.isa?.yearsCap ?? DEFAULT_YEARS_CAP,
    performanceFeePct: req.performanceFeePct ?? DEFAULT_PERFORMANCE_FEE,
    feeMethod: req.feeMethod ?? 'performance',
    annualFeeRate: req.isa?.annualFeeRate ?? DEFAULT_ANNUAL_FEE_RATE,
    indexToInflation: req.isa?.indexToInflation ?? false
  }
  if (resolved) checkIsa(isa, issues)

  const economy = {
    initialInflation: req.initialInflation ?? DEFAULT_ECONOMY.initialInflation,
    initialUnemployment: req.initialUnemployment ?? DEFAULT_ECONOMY.initialUnemployment
  }
  const inRange = (v: number, b: { min: number; max: number }) => Number.isFinite(v) && v >= b.min && v <= b.max
  if (!inRange(economy.initialInflation, INFLATION_BOUNDS)) {
    issues.push(`initialInflation must be within [${INFLATION_BOUNDS.min}, ${INFLATION_BOUNDS.max}] (got ${economy.initialInflation})`)
  }
  if (!inRange(economy.initialUnemployment, UNEMPLOYMENT_BOUNDS)) {
    issues.push(`initialUnemployment must be within [${UNEMPLOYMENT_BOUNDS.min}, ${UNEMPLOYMENT_BOUNDS.max}] (got ${economy.initialUnemployment})`)
  }

  if (!resolved || issues.length) throw new ConfigurationError(issues)

  return {
    programType: resolved.programType,
    scenario: resolved.scenario,
    numStudents: req.numStudents,
    numSims: req.numSims,
    horizonYears,
    seed: req.seed,
    graduationDelay: req.graduationDelay ?? false,
    degreeMix: resolved.degreeMix,
    isa,
    economy
  }
}
