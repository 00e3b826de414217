import { describe, it, expect } from 'vitest'
import { parseSimulationTime, computeTotalSteps } from './time-utils.js'
import {
  InvalidSimulationTimeError,
  UnknownTimeUnitError
} from '../../helpers/errors.js'

describe('parseSimulationTime', () => {
  it('keeps nanoseconds as given', () => {
    expect(parseSimulationTime('100ns')).toEqual({
      raw: '100ns',
      value: 100,
      unit: 'ns',
      nanoseconds: 100,
      totalSteps: 50_000_000
    })
  })

  it('converts picoseconds to nanoseconds', () => {
    const t = parseSimulationTime('500ps')
    expect(t.nanoseconds).toBe(0.5)
    expect(t.totalSteps).toBe(250_000)
  })

  it('converts microseconds and milliseconds', () => {
    expect(parseSimulationTime('2us').nanoseconds).toBe(2000)
    expect(parseSimulationTime('1ms').nanoseconds).toBe(1_000_000)
    expect(parseSimulationTime('1ms').totalSteps).toBe(500_000_000_000)
  })

  it('accepts the default duration', () => {
    const t = parseSimulationTime('10ns')
    expect(t.nanoseconds).toBe(10)
    expect(t.totalSteps).toBe(5_000_000)
  })

  it('accepts decimals and surrounding whitespace', () => {
    const t = parseSimulationTime(' 1.5ns ')
    expect(t.raw).toBe('1.5ns')
    expect(t.nanoseconds).toBe(1.5)
    expect(t.totalSteps).toBe(750_000)
  })

  it('rejects an unknown unit', () => {
    expect(() => parseSimulationTime('100fs')).toThrow(UnknownTimeUnitError)
    expect(() => parseSimulationTime('100fs')).toThrow(
      "Unknown time unit 'fs'. Use ns, ps, us, or ms."
    )
  })

  it('treats units as case sensitive', () => {
    expect(() => parseSimulationTime('100NS')).toThrow(UnknownTimeUnitError)
  })

  it('does not accept object prototype keys as units', () => {
    expect(() => parseSimulationTime('5constructor')).toThrow(UnknownTimeUnitError)
  })

  it('rejects a value without a unit', () => {
    expect(() => parseSimulationTime('100')).toThrow(InvalidSimulationTimeError)
  })

  it('rejects a unit without a value', () => {
    expect(() => parseSimulationTime('ns')).toThrow(
      "Invalid simulation time 'ns': missing numeric value"
    )
  })

  it('rejects negative and malformed values', () => {
    expect(() => parseSimulationTime('-5ns')).toThrow(InvalidSimulationTimeError)
    expect(() => parseSimulationTime('1e3ns')).toThrow(InvalidSimulationTimeError)
  })

  it('rejects durations whose step count is not a safe integer', () => {
    expect(() => parseSimulationTime('20000000ms')).toThrow(
      "Invalid simulation time '20000000ms': too long, step count exceeds 2^53 - 1"
    )
    expect(() => parseSimulationTime('1000000000ms')).toThrow(InvalidSimulationTimeError)
    expect(parseSimulationTime('10000ms').totalSteps).toBe(5_000_000_000_000_000)
    expect(() => parseSimulationTime('20000ms')).toThrow(InvalidSimulationTimeError)
  })

  it('rejects durations shorter than one step', () => {
    expect(() => parseSimulationTime('0ns')).toThrow(InvalidSimulationTimeError)
    expect(() => parseSimulationTime('0.001ps')).toThrow(InvalidSimulationTimeError)
  })
})

describe('computeTotalSteps', () => {
  it('uses a 2 fs timestep by default', () => {
    expect(computeTotalSteps(100)).toBe(50_000_000)
    expect(computeTotalSteps(0.001)).toBe(500)
  })

  it('drops partial steps', () => {
    expect(computeTotalSteps(0.000003)).toBe(1)
  })

  it('honours a custom timestep', () => {
    expect(computeTotalSteps(1, 0.001)).toBe(1_000_000)
    expect(computeTotalSteps(1, 0.004)).toBe(250_000)
  })
})
