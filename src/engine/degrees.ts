import type { CompletionClass, DegreeCode, DegreeOverrides, DegreeProgram } from '../types/engine'
import { categorical, type RandomContext } from './random'

export const GROWTH_BOUNDS = { min: -0.05, max: 0.1 } as const

// Earnings of a graduate who went back to a lower-wage home labor market
export const HOME_EARNINGS = { mean: 2600, stdDev: 690 } as const
// Applied to an NA student's informal income in a year spent at home
export const HOME_EARNINGS_FACTOR = 0.5

export const DEGREE_CODES: DegreeCode[] = ['BA', 'MA', 'VOC', 'NURSE', 'LABOR', 'NA']

export const DEFAULT_DEGREES: Record<DegreeCode, DegreeProgram> = {
  BA: {
    code: 'BA', name: "Bachelor's degree", meanEarnings: 41300, earningsStdDev: 13000, experienceGrowth: 0.04,
    yearsToComplete: 4, completionClass: 'undergraduate', leaveLaborForceProb: 0, homeProb: 0, employmentFriction: 0
  },
  MA: {
    code: 'MA', name: "Master's degree", meanEarnings: 46709, earningsStdDev: 15000, experienceGrowth: 0.04,
    yearsToComplete: 6, completionClass: 'professional', leaveLaborForceProb: 0, homeProb: 0, employmentFriction: 0
  },
  VOC: {
    code: 'VOC', name: 'Vocational training', meanEarnings: 31500, earningsStdDev: 4800, experienceGrowth: 0.04,
    yearsToComplete: 3, completionClass: 'undergraduate', leaveLaborForceProb: 0, homeProb: 0, employmentFriction: 0
  },
  NURSE: {
    code: 'NURSE', name: 'Nursing', meanEarnings: 44000, earningsStdDev: 8400, experienceGrowth: 0.01,
    yearsToComplete: 4, completionClass: 'professional', leaveLaborForceProb: 0, homeProb: 0, employmentFriction: 0
  },
  LABOR: {
    code: 'LABOR', name: 'Skilled trade', meanEarnings: 35000, earningsStdDev: 5000, experienceGrowth: 0.02,
    yearsToComplete: 3, completionClass: 'professional', leaveLaborForceProb: 0, homeProb: 0, employmentFriction: 0
  },
  NA: {
    code: 'NA', name: 'No advancement', meanEarnings: 2200, earningsStdDev: 640, experienceGrowth: 0.01,
    yearsToComplete: 0, completionClass: 'none', leaveLaborForceProb: 0, homeProb: 0.8, employmentFriction: 0
  }
}

const GRADUATION_DELAYS: Record<Exclude<CompletionClass, 'none'>, { years: number[]; weights: number[] }> = {
  undergraduate: { years: [0, 1, 2, 3, 4], weights: [0.5, 0.25, 0.125, 0.0625, 0.0625] },
  professional: { years: [0, 1, 2, 3], weights: [0.75, 0.2, 0.025, 0.025] }
}

export function graduationDelayTable(cls: CompletionClass): { years: number[]; weights: number[] } {
  if (cls === 'none') return { years: [0], weights: [1] }
  const t = GRADUATION_DELAYS[cls]
  return { years: [...t.years], weights: [...t.weights] }
}

export function drawGraduationDelay(cls: CompletionClass, ctx: RandomContext): number {
  if (cls === 'none') return 0
  const t = GRADUATION_DELAYS[cls]
  return t.years[categorical(ctx, t.weights)]
}

export function isDegreeCode(v: unknown): v is DegreeCode {
  return typeof v === 'string' && (DEGREE_CODES as string[]).includes(v)
}

function checkProbability(issues: string[], label: string, v: number) {
  if (!Number.isFinite(v) || v < 0 || v > 1) issues.push(`${label} must be a probability in [0, 1] (got ${v})`)
}

export function validateDegree(d: DegreeProgram): string[] {
  const issues: string[] = []
  const label = `degree ${d.code}`
  if (!Number.isFinite(d.meanEarnings) || d.meanEarnings < 0) issues.push(`${label}: meanEarnings must be >= 0`)
  if (!Number.isFinite(d.earningsStdDev) || d.earningsStdDev < 0) issues.push(`${label}: earningsStdDev must be >= 0`)
  if (!Number.isFinite(d.experienceGrowth) || d.experienceGrowth < GROWTH_BOUNDS.min || d.experienceGrowth > GROWTH_BOUNDS.max) {
    issues.push(`${label}: experienceGrowth must be within [${GROWTH_BOUNDS.min}, ${GROWTH_BOUNDS.max}]`)
  }
  if (!['undergraduate', 'professional', 'none'].includes(d.completionClass)) {
    issues.push(`${label}: completionClass must be 'undergraduate', 'professional' or 'none'`)
  }
  if (!Number.isInteger(d.yearsToComplete) || d.yearsToComplete < 0) issues.push(`${label}: yearsToComplete must be a non-negative integer`)
  checkProbability(issues, `${label}: leaveLaborForceProb`, d.leaveLaborForceProb)
  checkProbability(issues, `${label}: homeProb`, d.homeProb)
  checkProbability(issues, `${label}: employmentFriction`, d.employmentFriction)
  return issues
}

export function createDegree(code: DegreeCode, overrides: DegreeOverrides = {}): DegreeProgram {
  const base = DEFAULT_DEGREES[code]
  const merged: DegreeProgram = { ...base, ...overrides, code }
  // the NA track never graduates
  if (merged.completionClass === 'none' || code === 'NA') {
    const informal: DegreeProgram = { ...merged, completionClass: 'none', yearsToComplete: 0 }
    return Object.freeze(informal)
  }
  return Object.freeze(merged)
}
