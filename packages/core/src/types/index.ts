/**
 * Type definitions for the oracle-driven matcher.
 * @packageDocumentation
 */

// Oracle contract
export type { StateId, Sentinels, StateRole, TransitionQuery, TransitionResult, TransitionOracle } from './oracle'

// Match types
export type { MatchInput, MatchStrategy, MatchOptions, MatchVerdict, MatchOutcome, MatchSpan } from './match'

// Error types
export type { MatchErrorCode, MatchDiagnostic } from './errors'
export { OracleQueryError, ConfigurationError } from './errors'
