/**
 * Validation and classification of an oracle's reserved states.
 * @packageDocumentation
 */

import { z } from 'zod'

import type { Sentinels, StateId, StateRole } from '../types'
import { ConfigurationError } from '../types'

/**
 * Codepoint sent as `firstChar` at end of input when the oracle does not
 * configure one.
 *
 * @public
 */
export const DEFAULT_END_OF_INPUT = 0

/**
 * Sentinels with every optional field filled in.
 */
export interface ResolvedSentinels {
  readonly start: StateId
  readonly match: StateId
  readonly reject: StateId
  readonly endOfInput: number
  readonly maxStateId: StateId
}

export const stateIdSchema = z.number().int().nonnegative()

export const sentinelsSchema = z
  .object({
    start: stateIdSchema,
    match: stateIdSchema,
    reject: stateIdSchema,
    endOfInput: z.number().int().nonnegative().optional(),
    maxStateId: stateIdSchema.optional(),
  })
  .refine((s) => new Set([s.start, s.match, s.reject]).size === 3, {
    message: 'start, match and reject must be distinct states',
  })
  .refine((s) => s.maxStateId === undefined || Math.max(s.start, s.match, s.reject) <= s.maxStateId, {
    message: 'reserved states must not exceed maxStateId',
    path: ['maxStateId'],
  })

/**
 * Validate an oracle's sentinels and fill in defaults.
 *
 * @throws ConfigurationError with code `INVALID_SENTINELS`
 */
export function resolveSentinels(sentinels: Sentinels): ResolvedSentinels {
  const result = sentinelsSchema.safeParse(sentinels)
  if (!result.success) {
    throw new ConfigurationError('INVALID_SENTINELS', 'Invalid oracle sentinels', formatIssues(result.error))
  }

  const {
    start,
    match,
    reject,
    endOfInput = DEFAULT_END_OF_INPUT,
    maxStateId = Number.MAX_SAFE_INTEGER,
  } = result.data
  return { start, match, reject, endOfInput, maxStateId }
}

/**
 * Classify a state id by the role it plays for an oracle.
 *
 * @param state - State id returned by or sent to the oracle
 * @param sentinels - The oracle's reserved states
 * @returns The state's role; anything not reserved is `ordinary`
 *
 * @public
 */
export function classifyState(state: StateId, sentinels: Sentinels): StateRole {
  switch (state) {
    case sentinels.start:
      return { kind: 'start' }
    case sentinels.match:
      return { kind: 'match' }
    case sentinels.reject:
      return { kind: 'reject' }
    default:
      return { kind: 'ordinary', id: state }
  }
}

/**
 * Short label for a state in trace output (`START`, `MATCH`, `REJECT`, `#7`).
 */
export function stateLabel(state: StateId, sentinels: Sentinels): string {
  const role = classifyState(state, sentinels)
  return role.kind === 'ordinary' ? `#${role.id}` : role.kind.toUpperCase()
}

/**
 * Flatten zod issues into one line each.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  )
}
