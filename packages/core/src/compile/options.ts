/**
 * Engine option defaults and resolution.
 * @packageDocumentation
 */

import type { EngineOptions, ResolvedEngineOptions } from '../types'
import { InvalidInputError } from '../types'

/**
 * Default maximum number of automaton states before throwing an error.
 * This prevents runaway growth from large nested bounded repetitions.
 *
 * @public
 */
export const DEFAULT_MAX_STATES = 10_000

/**
 * Default engine options.
 *
 * @public
 */
export const DEFAULT_OPTIONS: ResolvedEngineOptions = {
  ignoreCase: false,
  dotAll: false,
  maxStates: DEFAULT_MAX_STATES,
}

/**
 * Resolve engine options by merging user-provided options with defaults.
 *
 * @throws InvalidInputError if an option has the wrong type or range
 *
 * @public
 */
export function resolveOptions(userOptions?: EngineOptions): ResolvedEngineOptions {
  if (!userOptions) {
    return DEFAULT_OPTIONS
  }

  const resolved: ResolvedEngineOptions = {
    ignoreCase: userOptions.ignoreCase ?? DEFAULT_OPTIONS.ignoreCase,
    dotAll: userOptions.dotAll ?? DEFAULT_OPTIONS.dotAll,
    maxStates: userOptions.maxStates ?? DEFAULT_OPTIONS.maxStates,
  }

  if (typeof resolved.ignoreCase !== 'boolean') {
    throw new InvalidInputError('ignoreCase', 'Option ignoreCase must be a boolean')
  }
  if (typeof resolved.dotAll !== 'boolean') {
    throw new InvalidInputError('dotAll', 'Option dotAll must be a boolean')
  }
  if (
    typeof resolved.maxStates !== 'number' ||
    !(resolved.maxStates === Infinity || (Number.isInteger(resolved.maxStates) && resolved.maxStates > 0))
  ) {
    throw new InvalidInputError('maxStates', 'Option maxStates must be a positive integer or Infinity')
  }

  return resolved
}
