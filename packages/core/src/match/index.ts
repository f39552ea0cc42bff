/**
 * Matching drivers and entry points.
 * @packageDocumentation
 */

export { matchInput, evaluateMatch, createMatcher, DEFAULT_STRATEGY, type Matcher } from './matcher'
export { runFrontier } from './frontier-driver'
export { runPath, type PathStackEntry } from './path-driver'
export { findMatch, findAllMatches, type SearchOptions } from './search'
