/**
 * Path driver - depth-first backtracking over (state, position) pairs.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { MatchInput, MatchOptions, MatchOutcome, StateId, TransitionOracle } from '../types'
import { createAttempt, finishAttempt, queryState } from '../engine/step-engine'
import { stateLabel } from '../oracle/sentinels'

const debugPath = registerDebug('nfa-probe:path')

/**
 * One pending exploration: a state to query at an input position.
 * @public
 */
export interface PathStackEntry {
  readonly state: StateId
  readonly position: number
}

/**
 * Decide whether an oracle accepts the whole input by exploring one path at a
 * time with an explicit stack.
 *
 * Successors are pushed `nextState` first, so the second branch of a split is
 * explored first. Each (state, position) pair is pushed at most once per
 * attempt, so the search is finite over a finite automaton and its verdict
 * agrees with the frontier driver whenever neither run exhausts its budget.
 *
 * @param input - String or codepoint sequence
 * @param oracle - Oracle to query
 * @param options - Only `maxCycles` applies
 * @returns The verdict with query count and diagnostics
 * @throws OracleQueryError if the oracle fails to answer
 *
 * @public
 */
export function runPath(input: MatchInput, oracle: TransitionOracle, options: MatchOptions = {}): MatchOutcome {
  const attempt = createAttempt(input, oracle, options.maxCycles)
  const end = attempt.input.length
  const { start, match } = attempt.sentinels

  const stack: PathStackEntry[] = [{ state: start, position: 0 }]
  const seen = new Set<string>([pairKey(start, 0)])
  let furthest = 0

  for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
    furthest = Math.max(furthest, entry.position)

    if (entry.state === match) {
      // Reached before the end of input; MATCH has no outgoing edges
      continue
    }

    const answer = queryState(attempt, entry.state, entry.position)
    if (answer.kind === 'exhausted') {
      debugPath(
        'exhausted at %s @%d, %d entries pending',
        stateLabel(entry.state, attempt.sentinels),
        entry.position,
        stack.length + 1,
      )
      return finishAttempt(attempt, 'exhausted', furthest)
    }

    for (const successor of answer.successors) {
      if (successor === match && answer.position === end) {
        debugPath('accepted after %d queries', attempt.guard.used)
        return finishAttempt(attempt, 'accepted', end)
      }

      const key = pairKey(successor, answer.position)
      if (seen.has(key)) continue
      seen.add(key)
      stack.push({ state: successor, position: answer.position })
    }
  }

  debugPath('rejected after %d queries, stack empty', attempt.guard.used)
  return finishAttempt(attempt, 'rejected', furthest)
}

function pairKey(state: StateId, position: number): string {
  return `${state}@${position}`
}
