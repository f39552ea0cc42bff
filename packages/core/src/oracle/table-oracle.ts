/**
 * An in-process oracle defined by a per-state rule table.
 *
 * Each state owns an ordered list of guarded rules, the way a generated
 * transition circuit lays out one case arm per state. The first rule whose
 * guards hold answers the query; a state with no applicable rule (or no rules
 * at all) answers REJECT without consuming.
 *
 * @packageDocumentation
 */

import { z } from 'zod'

import type { Sentinels, StateId, TransitionOracle, TransitionQuery, TransitionResult } from '../types'
import { ConfigurationError } from '../types'
import { toCodepoints } from '../engine/symbols'
import { formatIssues, resolveSentinels, sentinelsSchema, stateIdSchema } from './sentinels'

// =============================================================================
// DEFINITION
// =============================================================================

/**
 * One guarded transition rule.
 *
 * All present guards must hold. A rule without guards always applies.
 *
 * @public
 */
export interface OracleRule {
  /** Current symbol must be one of these characters */
  readonly on?: string

  /** Current symbol must be a real symbol not among these characters */
  readonly notOn?: string

  /** `true`: only at end of input. `false`: only before it. */
  readonly atEnd?: boolean

  /** Lookahead must be present and one of these characters */
  readonly lookahead?: string

  /** Lookahead must be absent or not one of these characters */
  readonly notLookahead?: string

  /** Primary successor */
  readonly next: StateId

  /** Secondary successor; sets `enabled` on the response */
  readonly branch?: StateId

  /**
   * Whether the rule consumes the current symbol.
   * @defaultValue false
   */
  readonly consume?: boolean
}

/**
 * Declarative definition of a table oracle. Plain JSON-compatible data.
 * @public
 */
export interface OracleDefinition {
  readonly sentinels: Sentinels

  /** Rules per state, keyed by the decimal state id */
  readonly states: Readonly<Record<string, readonly OracleRule[]>>
}

const ruleSchema = z
  .object({
    on: z.string().min(1).optional(),
    notOn: z.string().optional(),
    atEnd: z.boolean().optional(),
    lookahead: z.string().min(1).optional(),
    notLookahead: z.string().min(1).optional(),
    next: stateIdSchema,
    branch: stateIdSchema.optional(),
    consume: z.boolean().optional(),
  })
  .strict()

const definitionSchema = z
  .object({
    sentinels: sentinelsSchema,
    states: z.record(
      z.string().regex(/^(0|[1-9]\d*)$/, 'state keys must be decimal state ids without leading zeros'),
      z.array(ruleSchema),
    ),
  })
  .strict()
  .superRefine((definition, ctx) => {
    const { maxStateId } = definition.sentinels

    for (const [key, rules] of Object.entries(definition.states)) {
      const state = Number(key)
      if (!Number.isSafeInteger(state)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['states', key],
          message: 'state exceeds the safe integer range',
        })
      } else if (maxStateId !== undefined && state > maxStateId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['states', key],
          message: `state exceeds maxStateId ${maxStateId}`,
        })
      }
      if (maxStateId === undefined) continue

      rules.forEach((rule, index) => {
        for (const field of ['next', 'branch'] as const) {
          const target = rule[field]
          if (target !== undefined && target > maxStateId) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['states', key, index, field],
              message: `target ${target} exceeds maxStateId ${maxStateId}`,
            })
          }
        }
      })
    }
  })

/**
 * Validate untrusted data (e.g. parsed JSON) as an oracle definition.
 *
 * @param raw - Candidate definition
 * @returns The validated definition
 * @throws ConfigurationError with code `INVALID_ORACLE_DEFINITION`
 *
 * @public
 */
export function parseOracleDefinition(raw: unknown): OracleDefinition {
  const result = definitionSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError('INVALID_ORACLE_DEFINITION', 'Invalid oracle definition', formatIssues(result.error))
  }
  return result.data
}

// =============================================================================
// ORACLE
// =============================================================================

interface CompiledRule {
  readonly on?: ReadonlySet<number>
  readonly notOn?: ReadonlySet<number>
  readonly atEnd?: boolean
  readonly lookahead?: ReadonlySet<number>
  readonly notLookahead?: ReadonlySet<number>
  readonly result: TransitionResult
}

/**
 * Build an oracle from a rule table.
 *
 * The definition is validated first. End of input is recognised as
 * `firstChar === endOfInput` with no lookahead.
 *
 * @param definition - Rule table and sentinels
 * @returns A pure oracle safe for reuse across match calls
 * @throws ConfigurationError if the definition is invalid
 *
 * @public
 */
export function createTableOracle(definition: OracleDefinition): TransitionOracle {
  const validated = parseOracleDefinition(definition)
  const resolved = resolveSentinels(validated.sentinels)

  const table = new Map<StateId, readonly CompiledRule[]>()
  for (const [key, rules] of Object.entries(validated.states)) {
    table.set(Number(key), rules.map(compileRule))
  }

  const rejectResult: TransitionResult = { nextState: resolved.reject, consumed: false, enabled: false }

  return {
    sentinels: validated.sentinels,
    query(query: TransitionQuery): TransitionResult {
      const rules = table.get(query.currentState) ?? []
      const atEnd = !query.secondValid && query.firstChar === resolved.endOfInput
      const rule = rules.find((candidate) => ruleApplies(candidate, query, atEnd))
      return rule?.result ?? rejectResult
    },
  }
}

function compileRule(rule: OracleRule): CompiledRule {
  const result: TransitionResult =
    rule.branch === undefined
      ? { nextState: rule.next, consumed: rule.consume ?? false, enabled: false }
      : { nextState: rule.next, secondState: rule.branch, consumed: rule.consume ?? false, enabled: true }

  return {
    on: charSet(rule.on),
    notOn: charSet(rule.notOn),
    atEnd: rule.atEnd,
    lookahead: charSet(rule.lookahead),
    notLookahead: charSet(rule.notLookahead),
    result,
  }
}

function charSet(chars: string | undefined): ReadonlySet<number> | undefined {
  return chars === undefined ? undefined : new Set(toCodepoints(chars))
}

function ruleApplies(rule: CompiledRule, query: TransitionQuery, atEnd: boolean): boolean {
  if (rule.atEnd !== undefined && rule.atEnd !== atEnd) return false
  if (rule.on && (atEnd || !rule.on.has(query.firstChar))) return false
  if (rule.notOn && (atEnd || rule.notOn.has(query.firstChar))) return false
  if (rule.lookahead && !(query.secondValid && rule.lookahead.has(query.secondChar))) return false
  if (rule.notLookahead && query.secondValid && rule.notLookahead.has(query.secondChar)) return false
  return true
}
