/**
 * Frontier driver - breadth-style simulation over a live-state set.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { MatchInput, MatchOptions, MatchOutcome, MatchVerdict, StateId, TransitionOracle } from '../types'
import { createAttempt, finishAttempt, step, type MatchAttempt } from '../engine/step-engine'

const debugFrontier = registerDebug('nfa-probe:frontier')

/**
 * Where a frontier simulation stopped.
 */
export interface FrontierRun {
  readonly verdict: MatchVerdict

  /** Position of the verdict; for `accepted` this is the end of the match */
  readonly position: number
}

/**
 * Decide whether an oracle accepts the whole input, advancing a set of live
 * states one symbol at a time.
 *
 * @param input - String or codepoint sequence
 * @param oracle - Oracle to query
 * @param options - Only `maxCycles` applies
 * @returns The verdict with query count and diagnostics
 * @throws OracleQueryError if the oracle fails to answer
 *
 * @public
 */
export function runFrontier(input: MatchInput, oracle: TransitionOracle, options: MatchOptions = {}): MatchOutcome {
  const attempt = createAttempt(input, oracle, options.maxCycles)
  const run = simulateFrontier(attempt, 0, true)
  return finishAttempt(attempt, run.verdict, run.position)
}

/**
 * Simulate from `start`.
 *
 * Anchored runs accept only when MATCH is live at the end of input. Unanchored
 * runs accept at the first position where MATCH becomes live, which makes the
 * accepted position the earliest possible end of a match starting at `start`.
 */
export function simulateFrontier(attempt: MatchAttempt, start: number, anchored: boolean): FrontierRun {
  const end = attempt.input.length
  let frontier: ReadonlySet<StateId> = new Set([attempt.sentinels.start])
  let position = start

  for (;;) {
    if (debugFrontier.enabled) {
      debugFrontier('position %d of %d, frontier [%s]', position, end, [...frontier].join(', '))
    }

    const result = step(attempt, frontier, position, !anchored || position === end)
    if (result.kind === 'accepted' || result.kind === 'exhausted') {
      debugFrontier('%s at position %d after %d queries', result.kind, position, attempt.guard.used)
      return { verdict: result.kind, position }
    }

    if (position === end || result.frontier.size === 0) {
      debugFrontier('rejected at position %d after %d queries', position, attempt.guard.used)
      return { verdict: 'rejected', position }
    }

    frontier = result.frontier
    position++
  }
}
