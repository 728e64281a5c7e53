import type { PatternNode } from './ast'

// =============================================================================
// COMPILED PATTERN
// =============================================================================

/**
 * A compiled pattern ready for repeated matching.
 *
 * Everything here is built once by the compiler and only read afterwards,
 * so one compiled pattern can serve any number of concurrent searches.
 *
 * @public
 */
export interface CompiledPattern {
  /** Original source pattern */
  readonly source: string

  /** Parsed AST */
  readonly ast: PatternNode

  /** Quick-reject filters applied before simulation at each offset */
  readonly quickReject: QuickRejectFilter

  /** Thompson NFA for the whole pattern */
  readonly automaton: Automaton

  /** Length of the shortest string the pattern can match */
  readonly minLength: number

  /** Length of the longest match (undefined if unbounded) */
  readonly maxLength?: number
}

/**
 * Quick rejection filters for skipping start offsets.
 * @public
 */
export interface QuickRejectFilter {
  /** Every match starts at offset 0 (the pattern begins with ^ on all branches) */
  readonly anchoredStart: boolean

  /** Minimum number of characters left in the input for a match to fit */
  readonly minLength: number
}

// =============================================================================
// AUTOMATON
// =============================================================================

/**
 * A Thompson NFA over UTF-16 code units.
 *
 * The state table is append-only during construction and frozen once the
 * compiler hands it out. There is exactly one start and one accept state.
 *
 * @public
 */
export interface Automaton {
  /** All states in the automaton, indexed by id */
  readonly states: readonly AutomatonState[]

  /** Id of the start state */
  readonly start: number

  /** Id of the single accepting state */
  readonly accept: number
}

/**
 * Start and accept state of a sub-automaton inside a shared state table.
 * @public
 */
export interface Fragment {
  readonly start: number
  readonly accept: number
}

/**
 * A state in the automaton.
 * @public
 */
export interface AutomatonState {
  /** Unique identifier for this state (index in the states array) */
  readonly id: number

  /** Transitions from this state, in construction order */
  readonly transitions: readonly AutomatonTransition[]
}

/**
 * A transition in the automaton.
 * @public
 */
export type AutomatonTransition = CharTransition | ClassTransition | EpsilonTransition | AssertionTransition

/**
 * Transition on one exact code unit.
 * @public
 */
export interface CharTransition {
  readonly type: 'char'
  readonly char: string
  /** Target state ID */
  readonly target: number
}

/**
 * Membership test for a character class.
 * @public
 */
export interface CharMatcher {
  /** Test if a single code unit belongs to the class */
  test(char: string): boolean

  /** The class source for debugging/serialization */
  readonly source: string
}

/**
 * Transition on any code unit accepted by a class predicate.
 *
 * Negated classes stay predicates, so "anything but x" never enumerates
 * the alphabet.
 *
 * @public
 */
export interface ClassTransition {
  readonly type: 'class'
  readonly matcher: CharMatcher
  readonly target: number
}

/**
 * Epsilon transition (no input consumed).
 * @public
 */
export interface EpsilonTransition {
  readonly type: 'epsilon'
  readonly target: number
}

/**
 * Zero-width position check.
 * @public
 */
export type AssertionKind = 'start' | 'end'

/**
 * Transition taken without consuming input, but only where the assertion
 * holds: `start` at offset 0, `end` at the end of the input.
 * @public
 */
export interface AssertionTransition {
  readonly type: 'assertion'
  readonly assertion: AssertionKind
  readonly target: number
}
