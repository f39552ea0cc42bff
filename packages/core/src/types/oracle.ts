// =============================================================================
// STATE IDENTIFIERS
// =============================================================================

/**
 * An opaque automaton state identifier (a non-negative integer).
 * @public
 */
export type StateId = number

/**
 * The reserved state roles of an oracle-backed automaton.
 *
 * Oracles disagree on how these roles are numbered, so the numbering is
 * always supplied by the oracle itself and never assumed by the engine.
 *
 * @public
 */
export interface Sentinels {
  /** State the automaton starts in */
  readonly start: StateId

  /** Accepting state; only accepts at end of input */
  readonly match: StateId

  /** Dead state; absorbing */
  readonly reject: StateId

  /**
   * Codepoint sent as `firstChar` once the input is exhausted.
   * @defaultValue 0
   */
  readonly endOfInput?: number

  /**
   * Largest state id the oracle can answer with (e.g. 255 for an 8-bit
   * state bus). Successors above it are treated as malformed.
   */
  readonly maxStateId?: StateId
}

/**
 * Classification of a state id against an oracle's sentinels.
 * @public
 */
export type StateRole =
  | { readonly kind: 'start' }
  | { readonly kind: 'match' }
  | { readonly kind: 'reject' }
  | { readonly kind: 'ordinary'; readonly id: StateId }

// =============================================================================
// WIRE CONTRACT
// =============================================================================

/**
 * One transition query, as presented on the oracle's input side.
 * @public
 */
export interface TransitionQuery {
  /** State being queried */
  readonly currentState: StateId

  /** Codepoint at the current position, or the end-of-input sentinel */
  readonly firstChar: number

  /** Lookahead codepoint; meaningful only when `secondValid` */
  readonly secondChar: number

  /** Whether a lookahead symbol exists */
  readonly secondValid: boolean
}

/**
 * The oracle's answer to a {@link TransitionQuery}.
 * @public
 */
export interface TransitionResult {
  /** Primary successor */
  readonly nextState: StateId

  /** Secondary successor; meaningful only when `enabled` */
  readonly secondState?: StateId

  /** Whether the transition consumes `firstChar` */
  readonly consumed: boolean

  /** Whether `secondState` is present */
  readonly enabled: boolean
}

/**
 * A realized automaton that can only be observed through local queries.
 *
 * `query` must be a pure function of its input: the engine re-queries the
 * same state with different lookahead and reuses one oracle across calls.
 * It may throw to signal that it could not answer.
 *
 * @public
 */
export interface TransitionOracle {
  /** Numbering of the reserved states for this oracle */
  readonly sentinels: Sentinels

  /** Answer one local-transition query */
  query(query: TransitionQuery): TransitionResult
}
