import type { MatchDiagnostic } from './errors'

/**
 * Input accepted by the matchers: a string (split into codepoints) or a
 * codepoint sequence.
 * @public
 */
export type MatchInput = string | readonly number[]

/**
 * Exploration strategy used to drive the oracle.
 *
 * - `frontier`: breadth-style simulation over a live-state set
 * - `path`: depth-first backtracking over (state, position) pairs
 *
 * Both reach the same verdict whenever the query budget suffices.
 *
 * @public
 */
export type MatchStrategy = 'frontier' | 'path'

/**
 * Options for a match attempt.
 * @public
 */
export interface MatchOptions {
  /**
   * Maximum number of oracle queries per attempt.
   * Set to `Infinity` to disable the bound (not recommended).
   * @defaultValue 50
   */
  maxCycles?: number

  /**
   * Exploration strategy.
   * @defaultValue 'frontier'
   */
  strategy?: MatchStrategy
}

/**
 * Verdict of a match attempt.
 *
 * `exhausted` means the query budget ran out before the search could prove
 * either outcome; it is distinct from a proven `rejected`.
 *
 * @public
 */
export type MatchVerdict = 'accepted' | 'rejected' | 'exhausted'

/**
 * Full result of a match attempt.
 * @public
 */
export interface MatchOutcome {
  readonly verdict: MatchVerdict

  /** Oracle queries issued */
  readonly queries: number

  /** Furthest input position the attempt reached */
  readonly position: number

  /** Absorbed problems (pruned malformed responses, budget exhaustion) */
  readonly diagnostics: readonly MatchDiagnostic[]
}

/**
 * A matched region of the input, in codepoint offsets (`end` exclusive).
 * @public
 */
export interface MatchSpan {
  readonly start: number
  readonly end: number
}
