/**
 * Unanchored search for matches inside a larger input.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { MatchInput, MatchOptions, MatchSpan, TransitionOracle } from '../types'
import { createAttempt } from '../engine/step-engine'
import { toCodepoints } from '../engine/symbols'
import { simulateFrontier } from './frontier-driver'

const debugSearch = registerDebug('nfa-probe:search')

/**
 * Options for search. The query budget applies to each start position.
 * @public
 */
export type SearchOptions = Pick<MatchOptions, 'maxCycles'>

/**
 * Find the leftmost match, ending as early as possible.
 *
 * The oracle still sees the real lookahead symbol at the end of a candidate
 * span, so lookahead-guarded exits (possessive repetition) behave as they
 * would inside the full input. A start position whose attempt runs out of
 * budget counts as no match there.
 *
 * @param input - String or codepoint sequence
 * @param oracle - Oracle to query
 * @param options - Search options
 * @returns The first span found, or undefined
 * @throws OracleQueryError if the oracle fails to answer
 *
 * @public
 */
export function findMatch(
  input: MatchInput,
  oracle: TransitionOracle,
  options: SearchOptions = {},
): MatchSpan | undefined {
  const codepoints = toCodepoints(input)

  for (let start = 0; start <= codepoints.length; start++) {
    const span = matchFrom(codepoints, start, oracle, options)
    if (span !== undefined) {
      return span
    }
  }

  return undefined
}

/**
 * Find successive non-overlapping matches from left to right.
 *
 * After each match the search resumes at its end, or one position later for
 * an empty match.
 *
 * @public
 */
export function findAllMatches(input: MatchInput, oracle: TransitionOracle, options: SearchOptions = {}): MatchSpan[] {
  const codepoints = toCodepoints(input)
  const spans: MatchSpan[] = []
  let start = 0

  while (start < codepoints.length) {
    const span = matchFrom(codepoints, start, oracle, options)
    if (span === undefined) {
      start++
      continue
    }
    spans.push(span)
    start = Math.max(span.end, start + 1)
  }

  return spans
}

function matchFrom(
  codepoints: readonly number[],
  start: number,
  oracle: TransitionOracle,
  options: SearchOptions,
): MatchSpan | undefined {
  const attempt = createAttempt(codepoints, oracle, options.maxCycles)
  const run = simulateFrontier(attempt, start, false)

  if (run.verdict === 'exhausted') {
    debugSearch('attempt at %d exhausted %d queries; treated as no match', start, attempt.guard.limit)
  }
  return run.verdict === 'accepted' ? { start, end: run.position } : undefined
}
