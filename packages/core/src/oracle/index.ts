/**
 * Oracle contract support: sentinels, response decoding and table oracles.
 * @packageDocumentation
 */

export {
  DEFAULT_END_OF_INPUT,
  classifyState,
  resolveSentinels,
  stateLabel,
  type ResolvedSentinels,
} from './sentinels'
export { decodeTransition, type DecodedTransition } from './response'
export { createTableOracle, parseOracleDefinition, type OracleRule, type OracleDefinition } from './table-oracle'
