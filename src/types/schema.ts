// Simulation request schema and basic validator

import type { DegreeCode, DegreeOverrides, FeeMethod } from './engine'

export interface IsaTermsInput {
  percentage?: number
  threshold?: number
  cap?: number
  yearsCap?: number
  pricePerStudent?: number
  annualFeeRate?: number
  indexToInflation?: boolean
}

export interface SimulationRequest {
  programType: string
  scenario?: string
  numStudents: number
  numSims: number
  seed?: number
  graduationDelay?: boolean
  horizonYears?: number
  degreeMix?: Partial<Record<DegreeCode, number>> // percentages, custom scenario only
  degreeOverrides?: Partial<Record<DegreeCode, DegreeOverrides>>
  isa?: IsaTermsInput
  performanceFeePct?: number
  feeMethod?: FeeMethod
  initialInflation?: number
  initialUnemployment?: number
  homeProbability?: number
  leaveLaborForceProbability?: number
}

type Dict = Record<string, unknown>

const isDict = (v: unknown): v is Dict => !!v && typeof v === 'object' && !Array.isArray(v)

const optional = (v: unknown, type: 'number' | 'boolean' | 'string') => v === undefined || typeof v === type

export function validateSimulationRequest(data: unknown): { valid: boolean; errors?: string[] } {
  const errors: string[] = []
  function push(cond: boolean, msg: string) {
    if (!cond) errors.push(msg)
  }

  push(isDict(data), 'Request must be an object')
  if (!isDict(data)) return { valid: false, errors }

  push(typeof data.programType === 'string', 'programType is required (string)')
  push(optional(data.scenario, 'string'), 'scenario must be a string')
  push(typeof data.numStudents === 'number', 'numStudents is required (number)')
  push(typeof data.numSims === 'number', 'numSims is required (number)')
  push(optional(data.seed, 'number'), 'seed must be a number')
  push(optional(data.graduationDelay, 'boolean'), 'graduationDelay must be a boolean')
  push(optional(data.horizonYears, 'number'), 'horizonYears must be a number')
  push(optional(data.performanceFeePct, 'number'), 'performanceFeePct must be a number')
  push(optional(data.initialInflation, 'number'), 'initialInflation must be a number')
  push(optional(data.initialUnemployment, 'number'), 'initialUnemployment must be a number')
  push(optional(data.homeProbability, 'number'), 'homeProbability must be a number')
  push(optional(data.leaveLaborForceProbability, 'number'), 'leaveLaborForceProbability must be a number')
  push(
    data.feeMethod === undefined || data.feeMethod === 'performance' || data.feeMethod === 'investment-indexed',
    "feeMethod must be 'performance' or 'investment-indexed'"
  )

  if (data.degreeMix !== undefined) {
    push(isDict(data.degreeMix), 'degreeMix must be an object of percentages')
    if (isDict(data.degreeMix)) {
      for (const [k, v] of Object.entries(data.degreeMix)) {
        push(typeof v === 'number', `degreeMix.${k} must be a number`)
      }
    }
  }

  if (data.degreeOverrides !== undefined) {
    push(isDict(data.degreeOverrides), 'degreeOverrides must be an object')
    if (isDict(data.degreeOverrides)) {
      for (const [k, o] of Object.entries(data.degreeOverrides)) {
        push(isDict(o), `degreeOverrides.${k} must be an object`)
        if (!isDict(o)) continue
        for (const [field, v] of Object.entries(o)) {
          const ok = field === 'name' || field === 'completionClass' ? typeof v === 'string' : typeof v === 'number'
          push(ok, `degreeOverrides.${k}.${field} has the wrong type`)
        }
      }
    }
  }

  if (data.isa !== undefined) {
    push(isDict(data.isa), 'isa must be an object')
    if (isDict(data.isa)) {
      const isa = data.isa
      for (const f of ['percentage', 'threshold', 'cap', 'yearsCap', 'pricePerStudent', 'annualFeeRate']) {
        push(optional(isa[f], 'number'), `isa.${f} must be a number`)
      }
      push(optional(isa.indexToInflation, 'boolean'), 'isa.indexToInflation must be a boolean')
    }
  }

  return { valid: errors.length === 0, errors: errors.length ? errors : undefined }
}

export function isSimulationRequest(data: unknown): data is SimulationRequest {
  return validateSimulationRequest(data).valid
}
