import { readFileSync } from 'node:fs'

import type { TransitionOracle } from '../src/types'
import { createTableOracle, parseOracleDefinition, type OracleDefinition } from '../src/oracle'

/**
 * Oracle fixtures under `test/fixtures`, by file name without extension.
 */
export type FixtureName =
  | 'literal-abc'
  | 'class-repeat'
  | 'possessive-plus'
  | 'possessive-then-literal'
  | 'greedy-then-literal'
  | 'alternation'
  | 'any-but-digits'

export function loadDefinition(name: FixtureName): OracleDefinition {
  const text = readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), 'utf8')
  return parseOracleDefinition(JSON.parse(text))
}

export function loadOracle(name: FixtureName): TransitionOracle {
  return createTableOracle(loadDefinition(name))
}

/**
 * Oracle whose every state has an epsilon edge to a fresh state, so the
 * closure never reaches a fixpoint.
 */
export function runawayOracle(): TransitionOracle {
  return {
    sentinels: { start: 0, match: 1_000_000, reject: 1_000_001 },
    query: (query) => ({ nextState: query.currentState + 1, consumed: false, enabled: false }),
  }
}

/**
 * Oracle whose start state loops to itself on epsilon and never matches.
 */
export function selfLoopOracle(): TransitionOracle {
  return {
    sentinels: { start: 5, match: 6, reject: 7 },
    query: (query) => ({ nextState: query.currentState, consumed: false, enabled: false }),
  }
}

/**
 * Run `fn` and return what it threw, or undefined if it returned.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}
