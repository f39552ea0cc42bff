/**
 * Input handling: codepoint conversion and the per-position symbol window.
 * @packageDocumentation
 */

import type { MatchInput, TransitionQuery } from '../types'
import { ConfigurationError } from '../types'

/**
 * The symbol part of a {@link TransitionQuery}.
 */
export type SymbolWindow = Omit<TransitionQuery, 'currentState'>

/**
 * Convert input to a codepoint sequence.
 *
 * Strings are split by codepoint, so astral characters count as one symbol.
 * Sequences are passed through once every element is a non-negative integer.
 *
 * @throws ConfigurationError with code `INVALID_INPUT` for any other element
 *
 * @public
 */
export function toCodepoints(input: MatchInput): readonly number[] {
  if (typeof input !== 'string') {
    const index = input.findIndex((codepoint) => !Number.isSafeInteger(codepoint) || codepoint < 0)
    if (index !== -1) {
      throw new ConfigurationError('INVALID_INPUT', `Invalid codepoint ${input[index]} at position ${index}`)
    }
    return input
  }

  const codepoints: number[] = []
  for (const char of input) {
    const codepoint = char.codePointAt(0)
    if (codepoint !== undefined) {
      codepoints.push(codepoint)
    }
  }
  return codepoints
}

/**
 * Symbols presented to the oracle at a position.
 *
 * Before the end: the current symbol plus one symbol of lookahead when there
 * is one. At the end: the end-of-input sentinel with no lookahead.
 */
export function symbolWindow(input: readonly number[], position: number, endOfInput: number): SymbolWindow {
  if (position >= input.length) {
    return { firstChar: endOfInput, secondChar: 0, secondValid: false }
  }

  const hasLookahead = position + 1 < input.length
  return {
    firstChar: input[position],
    secondChar: hasLookahead ? input[position + 1] : 0,
    secondValid: hasLookahead,
  }
}
