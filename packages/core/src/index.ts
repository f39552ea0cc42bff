/**
 * Oracle-driven NFA matching
 *
 * Decides whether an input is accepted by a nondeterministic automaton that
 * can only be observed through a transition oracle: a realized state machine
 * answering one local-transition query at a time.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Oracle contract
  StateId,
  Sentinels,
  StateRole,
  TransitionQuery,
  TransitionResult,
  TransitionOracle,
  // Match types
  MatchInput,
  MatchStrategy,
  MatchOptions,
  MatchVerdict,
  MatchOutcome,
  MatchSpan,
  // Error types
  MatchErrorCode,
  MatchDiagnostic,
} from './types'
export { OracleQueryError, ConfigurationError } from './types'

// =============================================================================
// Oracles
// =============================================================================

export { classifyState, DEFAULT_END_OF_INPUT } from './oracle'
export { createTableOracle, parseOracleDefinition, type OracleRule, type OracleDefinition } from './oracle'

// =============================================================================
// Engine
// =============================================================================

export { CycleGuard, DEFAULT_MAX_CYCLES, toCodepoints } from './engine'

// =============================================================================
// Matching
// =============================================================================

export { matchInput, evaluateMatch, createMatcher, DEFAULT_STRATEGY, type Matcher } from './match'
export { runFrontier, runPath, type PathStackEntry } from './match'
export { findMatch, findAllMatches, type SearchOptions } from './match'
