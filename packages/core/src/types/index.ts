/**
 * Type definitions for the pattern engine.
 * @packageDocumentation
 */

// AST types
export type {
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
} from './ast'

// Automaton types
export type {
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
} from './automaton'

// Match types
export type { Span, Match, Replacement } from './match'

// Option types
export type { EngineOptions, ResolvedEngineOptions } from './options'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { PatternSyntaxError, AutomatonLimitError, InvalidInputError } from './errors'
