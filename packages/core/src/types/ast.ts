// =============================================================================
// PATTERN AST
// =============================================================================

/**
 * A node in the pattern AST.
 *
 * The variant set is closed: every consumer switches on `type` and the
 * compiler relies on exhaustiveness checking to stay total.
 *
 * @public
 */
export type PatternNode =
  | LiteralNode
  | CharClassNode
  | QuantifierNode
  | AnchorStartNode
  | AnchorEndNode
  | AlternationNode
  | GroupNode
  | SequenceNode

/**
 * A single code unit matched exactly.
 *
 * Escapes such as `\.` or `\n` resolve to literals while parsing.
 *
 * @public
 */
export interface LiteralNode {
  readonly type: 'literal'
  readonly value: string
}

/**
 * A character class like [a-z] or [^0-9].
 *
 * Predefined classes (`\d`, `\w`, `\s`, their negations) and the `.`
 * wildcard are desugared to this node by the parser.
 *
 * @public
 */
export interface CharClassNode {
  readonly type: 'charclass'

  /** Whether this is a negated class (e.g., [^abc]) */
  readonly negated: boolean

  /** Inclusive ranges; single characters are ranges with start === end */
  readonly ranges: readonly CharRange[]

  /**
   * Set only for the `.` wildcard, whose newline handling depends on the
   * `dotAll` option at compile time.
   */
  readonly wildcard?: true
}

/**
 * A character range within a character class.
 * @public
 */
export interface CharRange {
  /** Single code unit - start of range */
  readonly start: string
  /** Single code unit - end of range (inclusive) */
  readonly end: string
}

/**
 * Repetition of `child` between `min` and `max` times.
 *
 * @example
 *   "a*"     -> { min: 0, max: undefined }
 *   "a{2,3}" -> { min: 2, max: 3 }
 *
 * @public
 */
export interface QuantifierNode {
  readonly type: 'quantifier'
  readonly child: PatternNode
  readonly min: number
  /** Upper bound, or undefined when unbounded */
  readonly max: number | undefined
}

/**
 * `^` - zero-width, holds only at offset 0 of the input.
 * @public
 */
export interface AnchorStartNode {
  readonly type: 'anchorStart'
}

/**
 * `$` - zero-width, holds only at the end of the input.
 * @public
 */
export interface AnchorEndNode {
  readonly type: 'anchorEnd'
}

/**
 * `left|right`. Longer chains nest to the right: `a|b|c` is
 * Alternation(a, Alternation(b, c)).
 * @public
 */
export interface AlternationNode {
  readonly type: 'alternation'
  readonly left: PatternNode
  readonly right: PatternNode
}

/**
 * A parenthesized sub-pattern. Purely structural: nothing is captured.
 * @public
 */
export interface GroupNode {
  readonly type: 'group'
  readonly child: PatternNode
}

/**
 * Concatenation. An empty sequence matches the empty string.
 * @public
 */
export interface SequenceNode {
  readonly type: 'sequence'
  readonly children: readonly PatternNode[]
}
