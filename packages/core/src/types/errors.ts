/**
 * Error codes for pattern validation failures.
 * @public
 */
export type PatternErrorCode =
  | 'UNCLOSED_BRACKET' // [abc without ]
  | 'EMPTY_CHARCLASS' // []
  | 'INVALID_RANGE' // [z-a] (reversed)
  | 'UNCLOSED_GROUP' // (ab without )
  | 'UNMATCHED_PAREN' // ab) without (
  | 'UNSUPPORTED_GROUP' // (?=...), (?<name>...)
  | 'INVALID_ESCAPE' // \q, trailing \
  | 'INVALID_QUANTIFIER' // {3,1}, {x}, {2
  | 'NOTHING_TO_REPEAT' // *a, a|+b
  | 'REPEATED_QUANTIFIER' // a**, a+?
  | 'QUANTIFIED_ASSERTION' // ^*, $+
  | 'STATE_LIMIT' // Automaton construction exceeded state limit
  | 'INVALID_INPUT' // Non-string pattern, text or option value

/**
 * A pattern validation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown when a pattern cannot be parsed.
 *
 * Parsing stops at the first problem, so a pattern produces at most one
 * of these.
 *
 * @public
 */
export class PatternSyntaxError extends Error implements PatternError {
  readonly code: PatternErrorCode

  readonly position: number

  readonly length: number

  /** The pattern that failed to parse */
  readonly pattern: string

  /** Description without the location suffix */
  readonly reason: string

  constructor(code: PatternErrorCode, reason: string, pattern: string, position: number, length = 1) {
    super(`${reason} at position ${position} in /${pattern}/`)
    this.name = 'PatternSyntaxError'
    this.code = code
    this.reason = reason
    this.pattern = pattern
    this.position = position
    this.length = length
  }

  /** Plain error record without the formatted location suffix. */
  toPatternError(): PatternError {
    return {
      code: this.code,
      message: this.reason,
      position: this.position,
      length: this.length,
    }
  }
}

/**
 * Error thrown when automaton construction exceeds configured limits.
 *
 * Large bounded repetitions such as `(a{100}){100}` copy their operand once
 * per repetition, so the state table grows multiplicatively.
 *
 * @public
 */
export class AutomatonLimitError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(code: PatternErrorCode, message: string, limit: number, actual: number) {
    super(message)
    this.name = 'AutomatonLimitError'
    this.code = code
    this.limit = limit
    this.actual = actual
  }
}

/**
 * Error thrown when a caller passes a value of the wrong kind, such as a
 * number where text is expected. Distinct from a failed match, which is
 * reported as `null`.
 *
 * @public
 */
export class InvalidInputError extends Error {
  readonly code: PatternErrorCode = 'INVALID_INPUT'

  /** Name of the offending argument or option */
  readonly argument: string

  constructor(argument: string, message: string) {
    super(message)
    this.name = 'InvalidInputError'
    this.argument = argument
  }
}
