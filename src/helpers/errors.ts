import type { StepResult } from '../types/index.js'

class SimulationTimeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SimulationTimeError'
  }
}

class InvalidSimulationTimeError extends SimulationTimeError {
  constructor(readonly raw: string, reason: string) {
    super(`Invalid simulation time '${raw}': ${reason}`)
    this.name = 'InvalidSimulationTimeError'
  }
}

class UnknownTimeUnitError extends SimulationTimeError {
  constructor(readonly unit: string) {
    super(`Unknown time unit '${unit}'. Use ns, ps, us, or ms.`)
    this.name = 'UnknownTimeUnitError'
  }
}

/**
 * A `gmx` command exited non-zero, was killed, or could not be spawned.
 * `results` holds the commands of the failing step that ran, the failing one last.
 */
class GmxStepError extends Error {
  readonly results: StepResult[]

  constructor(
    readonly step: number,
    readonly stepName: string,
    readonly code: number | null,
    readonly signal: NodeJS.Signals | null,
    opts: { cause?: unknown; result?: StepResult } = {}
  ) {
    super(
      `Step ${step} (${stepName}) failed (exit ${code}${signal ? `, signal ${signal}` : ''})`,
      { cause: opts.cause }
    )
    this.name = 'GmxStepError'
    this.results = opts.result ? [opts.result] : []
  }
}

export {
  SimulationTimeError,
  InvalidSimulationTimeError,
  UnknownTimeUnitError,
  GmxStepError
}
