/**
 * Automaton execution engine primitives.
 * @packageDocumentation
 */

export { CycleGuard, DEFAULT_MAX_CYCLES, resolveMaxCycles } from './cycle-guard'
export { toCodepoints, symbolWindow, type SymbolWindow } from './symbols'
export {
  createAttempt,
  finishAttempt,
  queryState,
  epsilonClosure,
  step,
  type MatchAttempt,
  type QueryAnswer,
  type ClosureResult,
  type StepResult,
} from './step-engine'
