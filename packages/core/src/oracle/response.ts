/**
 * Decoding of raw oracle responses into successor branches.
 * @packageDocumentation
 */

import { z } from 'zod'

import type { StateId } from '../types'
import type { ResolvedSentinels } from './sentinels'

/**
 * A decoded oracle response.
 *
 * `ok: false` means the response as a whole was unusable and the queried
 * state is pruned. Otherwise `branches` holds the valid successors in wire
 * order (`nextState`, then `secondState`), and `problems` describes any
 * branch that was dropped.
 */
export type DecodedTransition =
  | {
      readonly ok: true
      readonly consumed: boolean
      readonly branches: readonly StateId[]
      readonly problems: readonly string[]
    }
  | { readonly ok: false; readonly problem: string }

const responseShapeSchema = z.object({
  nextState: z.unknown(),
  secondState: z.unknown(),
  consumed: z.boolean(),
  enabled: z.boolean(),
})

/**
 * Validate one oracle response.
 *
 * Branch-level problems (an invalid `nextState`, or an `enabled` response
 * without a valid `secondState`) only drop that branch.
 */
export function decodeTransition(raw: unknown, sentinels: ResolvedSentinels): DecodedTransition {
  const shape = responseShapeSchema.safeParse(raw)
  if (!shape.success) {
    return { ok: false, problem: `response is not a transition result (${describeShapeIssues(shape.error)})` }
  }

  const { nextState, secondState, consumed, enabled } = shape.data
  const branches: StateId[] = []
  const problems: string[] = []

  if (isStateId(nextState, sentinels.maxStateId)) {
    branches.push(nextState)
  } else {
    problems.push(`invalid nextState ${formatValue(nextState)}`)
  }

  if (enabled) {
    if (isStateId(secondState, sentinels.maxStateId)) {
      branches.push(secondState)
    } else {
      problems.push(`invalid secondState ${formatValue(secondState)} on enabled branch`)
    }
  }

  return { ok: true, consumed, branches, problems }
}

function isStateId(value: unknown, maxStateId: StateId): value is StateId {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 && value <= maxStateId
}

function formatValue(value: unknown): string {
  return value === undefined ? 'undefined' : JSON.stringify(value)
}

function describeShapeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`).join(', ')
}
