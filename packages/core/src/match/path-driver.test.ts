import { describe, it, expect, vi } from 'vitest'

import type { TransitionOracle } from '../types'
import { loadOracle, runawayOracle, selfLoopOracle } from '../../test/fixtures'
import { runPath } from './path-driver'

function spyOn(oracle: TransitionOracle) {
  const query = vi.fn(oracle.query)
  return { oracle: { sentinels: oracle.sentinels, query }, query }
}

describe('runPath', () => {
  it('accepts when (MATCH, end) is reached', () => {
    expect(runPath('abc', loadOracle('literal-abc'))).toEqual({
      verdict: 'accepted',
      queries: 4,
      position: 3,
      diagnostics: [],
    })
  })

  it('rejects when the stack empties', () => {
    expect(runPath('ab', loadOracle('literal-abc'))).toEqual({
      verdict: 'rejected',
      queries: 3,
      position: 2,
      diagnostics: [],
    })
  })

  it('treats MATCH before the end of input as a dead path', () => {
    expect(runPath('La', loadOracle('possessive-plus'))).toEqual({
      verdict: 'rejected',
      queries: 2,
      position: 1,
      diagnostics: [],
    })
  })

  it('explores the last pushed branch first', () => {
    const { oracle, query } = spyOn(loadOracle('greedy-then-literal'))
    const outcome = runPath('LL', oracle)

    expect(outcome.verdict).toBe('accepted')
    expect(query.mock.calls.map(([q]) => q.currentState)).toEqual([10, 13, 14, 15])
  })

  describe('termination', () => {
    it('stops at the query budget when epsilon states never repeat', () => {
      const outcome = runPath('ab', runawayOracle(), { maxCycles: 10 })

      expect(outcome.verdict).toBe('exhausted')
      expect(outcome.queries).toBe(10)
      expect(outcome.diagnostics).toEqual([
        {
          code: 'CYCLE_LIMIT_EXCEEDED',
          message: 'Match attempt exceeded the limit of 10 oracle queries',
          position: 0,
          limit: 10,
        },
      ])
    })

    it('does not revisit a (state, position) pair', () => {
      expect(runPath('abc', selfLoopOracle())).toEqual({
        verdict: 'rejected',
        queries: 1,
        position: 0,
        diagnostics: [],
      })
    })
  })
})
