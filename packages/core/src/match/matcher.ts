/**
 * Matching entry points - choose a strategy, run it, report the verdict.
 * @packageDocumentation
 */

import type { MatchInput, MatchOptions, MatchOutcome, MatchSpan, MatchStrategy, TransitionOracle } from '../types'
import { ConfigurationError } from '../types'
import { resolveMaxCycles } from '../engine/cycle-guard'
import { resolveSentinels } from '../oracle/sentinels'
import { runFrontier } from './frontier-driver'
import { runPath } from './path-driver'
import { findAllMatches, findMatch } from './search'

/**
 * Strategy used when none is given.
 *
 * @public
 */
export const DEFAULT_STRATEGY: MatchStrategy = 'frontier'

/**
 * Run a full match attempt and report how it ended.
 *
 * Unlike {@link matchInput}, this tells a proven rejection (`rejected`) apart
 * from a search that ran out of query budget (`exhausted`).
 *
 * @param input - String or codepoint sequence; the whole input must match
 * @param oracle - Oracle to query
 * @param options - Budget and strategy
 * @returns The outcome of the attempt
 * @throws OracleQueryError if the oracle fails to answer
 * @throws ConfigurationError for invalid sentinels or options
 *
 * @public
 */
export function evaluateMatch(input: MatchInput, oracle: TransitionOracle, options: MatchOptions = {}): MatchOutcome {
  const strategy = options.strategy ?? DEFAULT_STRATEGY

  switch (strategy) {
    case 'frontier':
      return runFrontier(input, oracle, options)
    case 'path':
      return runPath(input, oracle, options)
    default:
      return unknownStrategy(strategy)
  }
}

/**
 * Test whether the oracle accepts the whole input.
 *
 * An attempt that exhausts its query budget counts as no match; use
 * {@link evaluateMatch} to tell the two apart.
 *
 * @param input - String or codepoint sequence
 * @param oracle - Oracle to query
 * @param options - Budget and strategy
 * @returns true if accepted
 * @throws OracleQueryError if the oracle fails to answer
 *
 * @public
 */
export function matchInput(input: MatchInput, oracle: TransitionOracle, options: MatchOptions = {}): boolean {
  return evaluateMatch(input, oracle, options).verdict === 'accepted'
}

/**
 * An oracle bound to fixed options.
 * @public
 */
export interface Matcher {
  readonly oracle: TransitionOracle

  /** Whole-input test */
  isMatch(input: MatchInput): boolean

  /** Whole-input attempt with full outcome */
  evaluate(input: MatchInput): MatchOutcome

  /** Leftmost match; search always runs the frontier driver */
  find(input: MatchInput): MatchSpan | undefined

  /** All non-overlapping matches; search always runs the frontier driver */
  findAll(input: MatchInput): MatchSpan[]
}

/**
 * Bind an oracle and options into a reusable {@link Matcher}.
 *
 * Sentinels and options are validated immediately. The matcher holds no
 * state between calls.
 *
 * @throws ConfigurationError for invalid sentinels or options
 *
 * @public
 */
export function createMatcher(oracle: TransitionOracle, options: MatchOptions = {}): Matcher {
  resolveSentinels(oracle.sentinels)
  const strategy = options.strategy ?? DEFAULT_STRATEGY
  if (strategy !== 'frontier' && strategy !== 'path') {
    unknownStrategy(strategy)
  }
  const maxCycles = resolveMaxCycles(options.maxCycles)
  const resolved: MatchOptions = { maxCycles, strategy }

  return {
    oracle,
    isMatch: (input) => matchInput(input, oracle, resolved),
    evaluate: (input) => evaluateMatch(input, oracle, resolved),
    find: (input) => findMatch(input, oracle, { maxCycles }),
    findAll: (input) => findAllMatches(input, oracle, { maxCycles }),
  }
}

function unknownStrategy(strategy: never): never {
  throw new ConfigurationError('INVALID_OPTIONS', `Unknown match strategy: ${String(strategy)}`)
}
