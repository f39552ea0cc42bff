import { describe, it, expect } from 'vitest'

import { createTableOracle } from '../oracle'
import { loadOracle, runawayOracle } from '../../test/fixtures'
import { findAllMatches, findMatch } from './search'

// Start state steps straight to MATCH, so every position holds an empty match
const emptyMatchOracle = createTableOracle({
  sentinels: { start: 0, match: 1, reject: 2 },
  states: { '0': [{ next: 1 }] },
})

describe('findMatch', () => {
  it('finds the leftmost match', () => {
    expect(findMatch('xxabcx', loadOracle('literal-abc'))).toEqual({ start: 2, end: 5 })
  })

  it('returns undefined without a match', () => {
    expect(findMatch('xyz', loadOracle('literal-abc'))).toBeUndefined()
  })

  it('prefers the earliest end for a start position', () => {
    expect(findMatch('LLL', loadOracle('greedy-then-literal'))).toEqual({ start: 0, end: 2 })
  })

  it('lets the lookahead see past the end of the span', () => {
    // The possessive loop only exits when the next symbol is not L
    expect(findMatch('LLx', loadOracle('possessive-plus'))).toEqual({ start: 0, end: 2 })
  })

  it('finds empty matches', () => {
    expect(findMatch('', emptyMatchOracle)).toEqual({ start: 0, end: 0 })
  })

  it('skips start positions that exhaust their budget', () => {
    expect(findMatch('ab', runawayOracle(), { maxCycles: 5 })).toBeUndefined()
  })

  it('accepts codepoint sequences', () => {
    expect(findMatch([120, 97, 98, 99], loadOracle('literal-abc'))).toEqual({ start: 1, end: 4 })
  })
})

describe('findAllMatches', () => {
  it('finds consecutive matches', () => {
    expect(findAllMatches('abcabc', loadOracle('literal-abc'))).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 6 },
    ])
  })

  it('keeps possessive runs whole', () => {
    expect(findAllMatches('LLxL', loadOracle('possessive-plus'))).toEqual([
      { start: 0, end: 2 },
      { start: 3, end: 4 },
    ])
  })

  it('advances past empty matches', () => {
    expect(findAllMatches('ab', emptyMatchOracle)).toEqual([
      { start: 0, end: 0 },
      { start: 1, end: 1 },
    ])
  })

  it('returns nothing for empty input', () => {
    expect(findAllMatches('', loadOracle('literal-abc'))).toEqual([])
  })
})
