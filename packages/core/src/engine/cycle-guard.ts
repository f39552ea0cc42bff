import { ConfigurationError } from '../types'

/**
 * Default maximum number of oracle queries per match attempt.
 *
 * @public
 */
export const DEFAULT_MAX_CYCLES = 50

/**
 * Validate a query budget, falling back to {@link DEFAULT_MAX_CYCLES}.
 *
 * @throws ConfigurationError with code `INVALID_OPTIONS` for negative or fractional budgets
 */
export function resolveMaxCycles(maxCycles: number | undefined): number {
  const limit = maxCycles ?? DEFAULT_MAX_CYCLES
  if (limit !== Infinity && !(Number.isSafeInteger(limit) && limit >= 0)) {
    throw new ConfigurationError(
      'INVALID_OPTIONS',
      `maxCycles must be a non-negative integer or Infinity, got ${limit}`,
    )
  }
  return limit
}

/**
 * Counts oracle queries for one match attempt and refuses any past the limit.
 *
 * @public
 */
export class CycleGuard {
  /** Maximum queries allowed */
  readonly limit: number

  private count = 0

  constructor(limit: number = DEFAULT_MAX_CYCLES) {
    this.limit = resolveMaxCycles(limit)
  }

  /** Queries granted so far */
  get used(): number {
    return this.count
  }

  /** Whether the budget is spent */
  get exhausted(): boolean {
    return this.count >= this.limit
  }

  /**
   * Reserve one query.
   * @returns false once the limit has been reached
   */
  tryConsume(): boolean {
    if (this.exhausted) {
      return false
    }
    this.count++
    return true
  }
}
