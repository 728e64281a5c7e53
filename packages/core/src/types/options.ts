/**
 * Options accepted by `compile` and the `Engine` constructor.
 * All options are optional - undefined values use defaults.
 * @public
 */
export interface EngineOptions {
  /** Literals and classes match both case variants of a letter (default: false) */
  ignoreCase?: boolean

  /** The `.` wildcard also matches `\n` (default: false) */
  dotAll?: boolean

  /**
   * Maximum number of automaton states to create before throwing.
   * Set to `Infinity` to disable the limit (not recommended).
   * @defaultValue 10000
   */
  maxStates?: number
}

/**
 * Options with every default filled in.
 * @public
 */
export type ResolvedEngineOptions = Readonly<Required<EngineOptions>>
