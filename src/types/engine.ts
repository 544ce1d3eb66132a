export type DegreeCode = 'BA' | 'MA' | 'VOC' | 'NURSE' | 'LABOR' | 'NA'

export type CompletionClass = 'undergraduate' | 'professional' | 'none'

export type ProgramType = 'University' | 'TVET' | 'Labor'

export type ScenarioName = 'baseline' | 'conservative' | 'optimistic' | 'custom'

export type FeeMethod = 'performance' | 'investment-indexed'

export interface Money {
  nominal: number
  real: number
}

export interface DegreeProgram {
  readonly code: DegreeCode
  readonly name: string
  readonly meanEarnings: number
  readonly earningsStdDev: number
  readonly experienceGrowth: number // annual, decimal
  readonly yearsToComplete: number
  readonly completionClass: CompletionClass
  readonly leaveLaborForceProb: number // per year
  readonly homeProb: number // at graduation; per year for 'none'
  readonly employmentFriction: number // added to shared unemployment
}

export type DegreeOverrides = Partial<Omit<DegreeProgram, 'code'>>

export interface DegreeShare {
  degree: DegreeProgram
  probability: number
}

export interface IsaTerms {
  percentage: number
  threshold: number
  cap: number
  yearsCap: number
  pricePerStudent: number
  performanceFeePct: number
  feeMethod: FeeMethod
  annualFeeRate: number // investment-indexed only
  indexToInflation: boolean
}

export interface EconomyParams {
  initialInflation: number
  initialUnemployment: number
}

export interface EconomySnapshot {
  year: number
  inflation: number
  unemployment: number
  priceLevel: number
  isaThreshold: number
  isaCap: number
}

export interface SimulationConfig {
  programType: ProgramType
  scenario: ScenarioName
  numStudents: number
  numSims: number
  horizonYears: number
  seed?: number
  graduationDelay: boolean
  degreeMix: DegreeShare[]
  isa: IsaTerms
  economy: EconomyParams
}

export interface StudentYear {
  year: number
  employed: boolean
  earnings: Money
  payment: Money
  fee: Money
}

export type CapStatus = 'paymentCap' | 'yearsCap' | 'noCap'

export interface StudentSeries {
  degree: DegreeCode
  graduationYear: number | null
  returnedHome: boolean
  leftLaborForce: boolean
  capStatus: CapStatus
  total: Money
  years: StudentYear[]
}

export interface CohortRun {
  runIndex: number
  seed?: number
  paymentsByYear: Money[]
  feesByYear: Money[]
  investorByYear: Money[]
  activeByYear: number[]
  economy: EconomySnapshot[]
}

export interface IrrBasis {
  nominal: number
  real: number
}

export interface CapBreakdown {
  paymentCap: number
  yearsCap: number
  noCap: number
}

export interface RunStats {
  runIndex: number
  seed?: number
  employmentRate: number
  everEmployedRate: number
  repaymentRate: number
  caps: CapBreakdown
  avgRepaymentByCap: CapBreakdown // real, per student in the category
  totalPayment: Money
  investorPayment: Money
  feePayment: Money
  studentTotals: Money[]
  degreeCounts: Partial<Record<DegreeCode, number>>
  irr: { total: IrrBasis; investor: IrrBasis }
  paymentsByYear: Money[]
  investorByYear: Money[]
  feesByYear: Money[]
  activeByYear: number[]
  durationYears: number
}

export interface IrrStats {
  mean: number
  p10: number
  p50: number
  p90: number
  undefinedRuns: number
}

export type NumericalWarningKind = 'no-sign-change' | 'did-not-converge' | 'non-finite'

export interface NumericalWarning {
  kind: NumericalWarningKind
  metric: string
  runIndex: number
  message: string
}

export interface DegreeEcho {
  code: DegreeCode
  name: string
  probability: number
  expectedCount: number
  meanAssigned: number
}

export interface MonteSummary {
  runs: number
  totalInvestment: number
  irr: {
    total: { nominal: IrrStats; real: IrrStats }
    investor: { nominal: IrrStats; real: IrrStats }
  }
  averageTotalPayment: Money
  averageInvestorPayment: Money
  averageFeePayment: Money
  paymentQuantiles: Record<'p0' | 'p25' | 'p50' | 'p75' | 'p100', number>
  averageDurationYears: number
  employmentRate: number
  everEmployedRate: number
  repaymentRate: number
  caps: {
    counts: CapBreakdown
    pct: CapBreakdown
    avgRepayment: CapBreakdown
  }
  paymentByYear: Money[]
  investorPaymentByYear: Money[]
  feePaymentByYear: Money[]
  activeStudentsByYear: number[]
  degreeDistribution: DegreeEcho[]
}

export interface SimulationResult {
  config: SimulationConfig
  summary: MonteSummary
  runs: RunStats[]
  students: { runIndex: number; students: StudentSeries[]; economy: EconomySnapshot[] }[]
  warnings: NumericalWarning[]
}
