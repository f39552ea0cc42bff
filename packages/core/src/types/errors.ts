import type { StateId } from './oracle'

/**
 * Error and diagnostic codes raised while matching.
 * @public
 */
export type MatchErrorCode =
  | 'ORACLE_QUERY_FAILED' // oracle threw while answering a query
  | 'CYCLE_LIMIT_EXCEEDED' // query budget spent before a verdict
  | 'MALFORMED_RESPONSE' // response or branch failed validation
  | 'INVALID_SENTINELS' // reserved states missing, overlapping or out of range
  | 'INVALID_OPTIONS' // bad maxCycles or strategy
  | 'INVALID_INPUT' // codepoint sequence holds a non-codepoint
  | 'INVALID_ORACLE_DEFINITION' // table oracle definition failed validation

/**
 * A problem observed during a match attempt that did not abort it.
 * @public
 */
export interface MatchDiagnostic {
  /** Diagnostic classification code */
  readonly code: MatchErrorCode

  /** Human-readable description */
  readonly message: string

  /** State whose query produced the diagnostic */
  readonly state?: StateId

  /** Input position (codepoint offset) of that query */
  readonly position?: number

  /** The limit that was reached, for `CYCLE_LIMIT_EXCEEDED` */
  readonly limit?: number
}

/**
 * Error thrown when the oracle fails to answer a query.
 *
 * A failed query leaves the attempt in an unknown state, so the whole
 * attempt is aborted and nothing is retried.
 *
 * @public
 */
export class OracleQueryError extends Error {
  /** Error classification code */
  readonly code: MatchErrorCode = 'ORACLE_QUERY_FAILED'

  /** State that was being queried */
  readonly state: StateId

  /** Input position of the failed query */
  readonly position: number

  constructor(state: StateId, position: number, cause: unknown) {
    super(`Oracle failed to answer query for state ${state} at position ${position}: ${describeCause(cause)}`, {
      cause,
    })
    this.name = 'OracleQueryError'
    this.state = state
    this.position = position
  }
}

/**
 * Error thrown for invalid sentinels, options, input or oracle definitions.
 * Raised before any query is issued.
 *
 * @public
 */
export class ConfigurationError extends Error {
  /** Error classification code */
  readonly code: MatchErrorCode

  /** Individual validation failures, one line each */
  readonly issues: readonly string[]

  constructor(code: MatchErrorCode, message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ConfigurationError'
    this.code = code
    this.issues = issues
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
