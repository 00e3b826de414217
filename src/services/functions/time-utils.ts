import { InvalidSimulationTimeError, UnknownTimeUnitError } from '../../helpers/errors.js'
import type { SimulationTime, TimeUnit } from '../../types/index.js'

// Femtoseconds per unit. Working in fs keeps 500ps -> 0.5ns exact.
const FS_PER_UNIT: Record<TimeUnit, number> = {
  ps: 1e3,
  ns: 1e6,
  us: 1e9,
  ms: 1e12
}

const FS_PER_NS = 1e6

/** Integration timestep shared by every `md` integrator .mdp file, in ps. */
const TIMESTEP_PS = 0.002

const DEFAULT_SIM_TIME = '10ns'

const isTimeUnit = (unit: string): unit is TimeUnit => Object.hasOwn(FS_PER_UNIT, unit)

/**
 * Number of integration steps needed to cover `nanoseconds` at `timestepPs`.
 * Partial steps are dropped.
 */
const computeTotalSteps = (nanoseconds: number, timestepPs = TIMESTEP_PS): number => {
  const femtoseconds = Math.round(nanoseconds * FS_PER_NS * 1000) / 1000
  const stepFs = Math.round(timestepPs * 1e6) / 1000
  return Math.trunc(femtoseconds / stepFs)
}

/**
 * Parse a `<number><unit>` duration such as `100ns` or `1.5us`.
 */
const parseSimulationTime = (raw: string): SimulationTime => {
  const trimmed = raw.trim()
  const match = trimmed.match(/^(\d+(?:\.\d+)?)?\s*([A-Za-z]*)$/)
  if (!match) {
    throw new InvalidSimulationTimeError(raw, 'expected <number><unit>, e.g. 100ns')
  }
  const [, valueText, unit] = match
  if (!valueText) {
    throw new InvalidSimulationTimeError(raw, 'missing numeric value')
  }
  if (!unit) {
    throw new InvalidSimulationTimeError(raw, 'missing time unit (ns, ps, us, or ms)')
  }
  if (!isTimeUnit(unit)) {
    throw new UnknownTimeUnitError(unit)
  }

  const value = Number(valueText)
  const nanoseconds = (value * FS_PER_UNIT[unit]) / FS_PER_NS
  const totalSteps = computeTotalSteps(nanoseconds)
  if (totalSteps < 1) {
    throw new InvalidSimulationTimeError(raw, 'shorter than one integration step')
  }
  if (!Number.isSafeInteger(totalSteps)) {
    throw new InvalidSimulationTimeError(raw, 'too long, step count exceeds 2^53 - 1')
  }

  return { raw: trimmed, value, unit, nanoseconds, totalSteps }
}

export { parseSimulationTime, computeTotalSteps, TIMESTEP_PS, DEFAULT_SIM_TIME }
