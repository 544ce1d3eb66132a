// Invalid or contradictory input, raised before any run starts
export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues]
    super(list.length === 1 ? list[0] : `Invalid simulation configuration:\n- ${list.join('\n- ')}`)
    this.name = 'ConfigurationError'
    this.issues = list
  }
}

// A ledger broke an accounting rule; the run is aborted and reported as a defect
export class InternalInvariantViolation extends Error {
  readonly violations: string[]
  readonly runIndex: number

  constructor(runIndex: number, violations: string[]) {
    super(`Run ${runIndex} violated ${violations.length} invariant(s): ${violations.slice(0, 3).join('; ')}`)
    this.name = 'InternalInvariantViolation'
    this.violations = violations
    this.runIndex = runIndex
  }
}

export class SimulationCancelled extends Error {
  readonly completedRuns: number

  constructor(completedRuns: number) {
    super(`Simulation cancelled after ${completedRuns} run(s)`)
    this.name = 'SimulationCancelled'
    this.completedRuns = completedRuns
  }
}
