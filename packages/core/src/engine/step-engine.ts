/**
 * Step engine - one oracle query at a time, epsilon-closure and consuming steps.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type {
  MatchDiagnostic,
  MatchInput,
  MatchOutcome,
  MatchVerdict,
  StateId,
  TransitionOracle,
  TransitionResult,
} from '../types'
import { OracleQueryError } from '../types'
import { resolveSentinels, stateLabel, type ResolvedSentinels } from '../oracle/sentinels'
import { decodeTransition } from '../oracle/response'
import { CycleGuard } from './cycle-guard'
import { symbolWindow, toCodepoints } from './symbols'

const debugStep = registerDebug('nfa-probe:step')

/**
 * Private state of a single match attempt. Created per call and discarded
 * with it; nothing here is shared between calls.
 */
export interface MatchAttempt {
  readonly input: readonly number[]
  readonly oracle: TransitionOracle
  readonly sentinels: ResolvedSentinels
  readonly guard: CycleGuard
  readonly diagnostics: MatchDiagnostic[]
}

/**
 * Start a match attempt. Validates sentinels and budget before any query.
 */
export function createAttempt(
  input: MatchInput,
  oracle: TransitionOracle,
  maxCycles: number | undefined,
): MatchAttempt {
  return {
    input: toCodepoints(input),
    oracle,
    sentinels: resolveSentinels(oracle.sentinels),
    guard: new CycleGuard(maxCycles),
    diagnostics: [],
  }
}

/**
 * Package an attempt's verdict as a {@link MatchOutcome}.
 */
export function finishAttempt(attempt: MatchAttempt, verdict: MatchVerdict, position: number): MatchOutcome {
  const diagnostics = [...attempt.diagnostics]
  if (verdict === 'exhausted') {
    diagnostics.push({
      code: 'CYCLE_LIMIT_EXCEEDED',
      message: `Match attempt exceeded the limit of ${attempt.guard.limit} oracle queries`,
      position,
      limit: attempt.guard.limit,
    })
  }
  return { verdict, queries: attempt.guard.used, position, diagnostics }
}

// =============================================================================
// SINGLE QUERY
// =============================================================================

/**
 * Result of querying one state.
 *
 * `position` is where the successors live: the queried position for an
 * epsilon transition, the next one for a consuming transition.
 */
export type QueryAnswer =
  | { readonly kind: 'answered'; readonly position: number; readonly successors: readonly StateId[] }
  | { readonly kind: 'exhausted' }

const EXHAUSTED: QueryAnswer = { kind: 'exhausted' }

/**
 * Query the oracle for one state at one position.
 *
 * REJECT successors, malformed branches and consuming transitions at end of
 * input are pruned here, so callers only see live successors.
 *
 * @throws OracleQueryError if the oracle throws
 */
export function queryState(attempt: MatchAttempt, state: StateId, position: number): QueryAnswer {
  if (!attempt.guard.tryConsume()) {
    return EXHAUSTED
  }

  const query = { currentState: state, ...symbolWindow(attempt.input, position, attempt.sentinels.endOfInput) }
  let raw: TransitionResult
  try {
    raw = attempt.oracle.query(query)
  } catch (error) {
    throw new OracleQueryError(state, position, error)
  }

  const decoded = decodeTransition(raw, attempt.sentinels)
  if (!decoded.ok) {
    recordMalformed(attempt, state, position, decoded.problem)
    return { kind: 'answered', position, successors: [] }
  }
  for (const problem of decoded.problems) {
    recordMalformed(attempt, state, position, problem)
  }

  const { reject } = attempt.sentinels
  const successors = decoded.branches.filter((successor) => successor !== reject)

  if (decoded.consumed && position >= attempt.input.length) {
    debugStep('%s @%d wants to consume at end of input; path dies', stateLabel(state, attempt.sentinels), position)
    return { kind: 'answered', position: position + 1, successors: [] }
  }

  const target = decoded.consumed ? position + 1 : position
  if (debugStep.enabled) {
    debugStep(
      '%s @%d %s -> [%s] @%d',
      stateLabel(state, attempt.sentinels),
      position,
      decoded.consumed ? 'consume' : 'epsilon',
      successors.map((successor) => stateLabel(successor, attempt.sentinels)).join(', '),
      target,
    )
  }
  return { kind: 'answered', position: target, successors }
}

function recordMalformed(attempt: MatchAttempt, state: StateId, position: number, problem: string): void {
  debugStep('%s @%d malformed response pruned: %s', stateLabel(state, attempt.sentinels), position, problem)
  attempt.diagnostics.push({
    code: 'MALFORMED_RESPONSE',
    message: `Malformed response for state ${state} at position ${position}: ${problem}`,
    state,
    position,
  })
}

// =============================================================================
// CLOSURE AND STEP
// =============================================================================

/**
 * Result of expanding a frontier at one position.
 *
 * When `settled`, `closure` holds every state reachable at the position via
 * epsilon transitions and `advanced` the successors of consuming
 * transitions, which form the next position's frontier.
 */
export type ClosureResult =
  | { readonly kind: 'accepted' }
  | { readonly kind: 'exhausted' }
  | { readonly kind: 'settled'; readonly closure: ReadonlySet<StateId>; readonly advanced: ReadonlySet<StateId> }

/**
 * Compute the epsilon-closure of a frontier at a position.
 *
 * States are queried in rounds, each round in increasing numeric order, and
 * each state at most once per position; the closure is complete when a round
 * discovers nothing new. MATCH is never queried. When `accepting`, reaching
 * MATCH ends the closure with `accepted`.
 *
 * @param accepting - Whether MATCH accepts at this position
 */
export function epsilonClosure(
  attempt: MatchAttempt,
  frontier: ReadonlySet<StateId>,
  position: number,
  accepting: boolean,
): ClosureResult {
  const { match } = attempt.sentinels
  if (accepting && frontier.has(match)) {
    return { kind: 'accepted' }
  }

  const closure = new Set(frontier)
  const advanced = new Set<StateId>()
  let pending = sortStates(frontier)

  while (pending.length > 0) {
    const discovered: StateId[] = []

    for (const state of pending) {
      if (state === match) continue

      const answer = queryState(attempt, state, position)
      if (answer.kind === 'exhausted') {
        return { kind: 'exhausted' }
      }

      for (const successor of answer.successors) {
        if (answer.position !== position) {
          advanced.add(successor)
          continue
        }
        if (closure.has(successor)) continue

        closure.add(successor)
        if (accepting && successor === match) {
          return { kind: 'accepted' }
        }
        discovered.push(successor)
      }
    }

    pending = sortStates(discovered)
  }

  return { kind: 'settled', closure, advanced }
}

/**
 * Result of one consuming step.
 */
export type StepResult =
  | { readonly kind: 'accepted' }
  | { readonly kind: 'exhausted' }
  | { readonly kind: 'advanced'; readonly frontier: ReadonlySet<StateId> }

/**
 * Advance a frontier past the symbol at `position`: close it under epsilon
 * transitions, then collect what the consuming transitions reach.
 *
 * The returned frontier belongs to `position + 1` and is empty when no path
 * survives (always the case at end of input).
 */
export function step(
  attempt: MatchAttempt,
  frontier: ReadonlySet<StateId>,
  position: number,
  accepting: boolean,
): StepResult {
  const result = epsilonClosure(attempt, frontier, position, accepting)
  if (result.kind !== 'settled') {
    return result
  }
  return { kind: 'advanced', frontier: result.advanced }
}

function sortStates(states: Iterable<StateId>): StateId[] {
  return [...states].sort((a, b) => a - b)
}
