/**
 * Thompson NFA regular expressions
 *
 * A library for parsing a restricted regular-expression dialect, compiling
 * it to a non-deterministic finite automaton and running that automaton
 * over text without backtracking.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
  PatternNode,
  LiteralNode,
  CharClassNode,
  CharRange,
  QuantifierNode,
  AnchorStartNode,
  AnchorEndNode,
  AlternationNode,
  GroupNode,
  SequenceNode,
  // Automaton types
  CompiledPattern,
  QuickRejectFilter,
  Automaton,
  Fragment,
  AutomatonState,
  AutomatonTransition,
  CharTransition,
  CharMatcher,
  ClassTransition,
  EpsilonTransition,
  AssertionKind,
  AssertionTransition,
  // Match types
  Span,
  Match,
  Replacement,
  // Option types
  EngineOptions,
  ResolvedEngineOptions,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { PatternSyntaxError, AutomatonLimitError, InvalidInputError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parsePattern } from './parse'
export { validatePattern, isValidPattern } from './parse'
export { classEscape, complementRanges, normalizeRanges } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compilePattern } from './compile'
export { buildAutomaton, getMinLength, getMaxLength, isUnbounded } from './compile'
export { buildQuickRejectFilter, applyQuickReject } from './compile'
export { buildCharMatcher } from './compile'
export { resolveOptions, DEFAULT_OPTIONS, DEFAULT_MAX_STATES } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { runAutomaton, epsilonClosure } from './match'

// =============================================================================
// Engine
// =============================================================================

export { Engine, compile, escapePattern } from './engine'

// =============================================================================
// Automaton Tooling
// =============================================================================

export { automatonToDot, type DotOptions } from './automaton'
