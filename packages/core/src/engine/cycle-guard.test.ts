import { describe, it, expect } from 'vitest'

import { ConfigurationError } from '../types'
import { CycleGuard, DEFAULT_MAX_CYCLES, resolveMaxCycles } from './cycle-guard'

describe('CycleGuard', () => {
  it('grants exactly limit queries', () => {
    const guard = new CycleGuard(3)

    expect([guard.tryConsume(), guard.tryConsume(), guard.tryConsume(), guard.tryConsume()]).toEqual([
      true,
      true,
      true,
      false,
    ])
    expect(guard.used).toBe(3)
    expect(guard.exhausted).toBe(true)
  })

  it('defaults to DEFAULT_MAX_CYCLES', () => {
    const guard = new CycleGuard()

    expect(guard.limit).toBe(DEFAULT_MAX_CYCLES)
    expect(DEFAULT_MAX_CYCLES).toBe(50)
  })

  it('refuses every query with a zero budget', () => {
    const guard = new CycleGuard(0)

    expect(guard.exhausted).toBe(true)
    expect(guard.tryConsume()).toBe(false)
    expect(guard.used).toBe(0)
  })

  it('never exhausts an infinite budget', () => {
    const guard = new CycleGuard(Infinity)
    for (let i = 0; i < 1000; i++) {
      guard.tryConsume()
    }

    expect(guard.exhausted).toBe(false)
    expect(guard.used).toBe(1000)
  })
})

describe('resolveMaxCycles', () => {
  it('falls back to the default', () => {
    expect(resolveMaxCycles(undefined)).toBe(DEFAULT_MAX_CYCLES)
  })

  it('rejects negative, fractional and NaN budgets', () => {
    expect(() => resolveMaxCycles(-1)).toThrow(ConfigurationError)
    expect(() => resolveMaxCycles(2.5)).toThrow(ConfigurationError)
    expect(() => resolveMaxCycles(Number.NaN)).toThrow(ConfigurationError)
  })
})
