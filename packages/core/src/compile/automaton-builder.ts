/**
 * Automaton builder - converts pattern AST to a Thompson NFA.
 * @packageDocumentation
 */

import type {
  PatternNode,
  QuantifierNode,
  Automaton,
  AutomatonState,
  AutomatonTransition,
  Fragment,
  ResolvedEngineOptions,
} from '../types'
import { AutomatonLimitError } from '../types'
import { buildCharMatcher, caseVariants } from './char-matcher'
import { DEFAULT_OPTIONS } from './options'

/**
 * Mutable state builder for constructing automata.
 */
interface AutomatonBuilder {
  states: AutomatonState[]
  nextStateId: number
  options: ResolvedEngineOptions
}

/**
 * Build a Thompson NFA from a pattern AST.
 *
 * Every node compiles to a fragment with one start and one accept state;
 * fragments are composed with epsilon transitions. State ids are indices
 * into one shared state table and are never reused.
 *
 * @param root - Parsed pattern AST
 * @param options - Resolved engine options
 * @returns Automaton (NFA)
 * @throws AutomatonLimitError if the state count exceeds `options.maxStates`
 *
 * @public
 */
export function buildAutomaton(root: PatternNode, options: ResolvedEngineOptions = DEFAULT_OPTIONS): Automaton {
  const builder: AutomatonBuilder = {
    states: [],
    nextStateId: 0,
    options,
  }

  const fragment = buildNodeAutomaton(builder, root)

  return {
    states: builder.states,
    start: fragment.start,
    accept: fragment.accept,
  }
}

/**
 * Create a new state in the automaton.
 */
function createState(builder: AutomatonBuilder): number {
  const { maxStates } = builder.options
  if (builder.states.length >= maxStates) {
    throw new AutomatonLimitError(
      'STATE_LIMIT',
      `Automaton construction exceeded limit of ${maxStates} states. ` +
        `Consider reducing repetition counts or increasing the maxStates limit.`,
      maxStates,
      builder.states.length + 1,
    )
  }

  const id = builder.nextStateId++
  builder.states.push({
    id,
    transitions: [],
  })
  return id
}

/**
 * Add a transition to a state.
 */
function addTransition(builder: AutomatonBuilder, fromState: number, transition: AutomatonTransition): void {
  const state = builder.states[fromState]
  builder.states[fromState] = {
    ...state,
    transitions: [...state.transitions, transition],
  }
}

function addEpsilon(builder: AutomatonBuilder, fromState: number, target: number): void {
  addTransition(builder, fromState, { type: 'epsilon', target })
}

/**
 * A fragment that matches the empty string: one state, start = accept.
 */
function emptyFragment(builder: AutomatonBuilder): Fragment {
  const state = createState(builder)
  return { start: state, accept: state }
}

/**
 * Build the fragment for a pattern node.
 */
function buildNodeAutomaton(builder: AutomatonBuilder, node: PatternNode): Fragment {
  switch (node.type) {
    case 'literal': {
      const start = createState(builder)
      const accept = createState(builder)
      const chars = builder.options.ignoreCase ? caseVariants(node.value) : [node.value]
      for (const char of chars) {
        addTransition(builder, start, { type: 'char', char, target: accept })
      }
      return { start, accept }
    }

    case 'charclass': {
      const start = createState(builder)
      const accept = createState(builder)
      addTransition(builder, start, {
        type: 'class',
        matcher: buildCharMatcher(node, builder.options),
        target: accept,
      })
      return { start, accept }
    }

    case 'anchorStart':
    case 'anchorEnd': {
      const start = createState(builder)
      const accept = createState(builder)
      addTransition(builder, start, {
        type: 'assertion',
        assertion: node.type === 'anchorStart' ? 'start' : 'end',
        target: accept,
      })
      return { start, accept }
    }

    case 'sequence': {
      if (node.children.length === 0) {
        return emptyFragment(builder)
      }

      const fragments = node.children.map((child) => buildNodeAutomaton(builder, child))
      for (let i = 1; i < fragments.length; i++) {
        addEpsilon(builder, fragments[i - 1].accept, fragments[i].start)
      }
      return { start: fragments[0].start, accept: fragments[fragments.length - 1].accept }
    }

    case 'alternation': {
      const start = createState(builder)
      const left = buildNodeAutomaton(builder, node.left)
      const right = buildNodeAutomaton(builder, node.right)
      const accept = createState(builder)

      addEpsilon(builder, start, left.start)
      addEpsilon(builder, start, right.start)
      addEpsilon(builder, left.accept, accept)
      addEpsilon(builder, right.accept, accept)
      return { start, accept }
    }

    case 'group':
      // Nothing is captured, so a group is its child
      return buildNodeAutomaton(builder, node.child)

    case 'quantifier':
      return buildQuantifierAutomaton(builder, node)
  }
}

/**
 * Build the fragment for a repetition.
 *
 * Layout: `min` mandatory copies of the child, then either one looping
 * copy (unbounded) or `max - min` optional copies, each of which can skip
 * straight to the overall accept state.
 */
function buildQuantifierAutomaton(builder: AutomatonBuilder, node: QuantifierNode): Fragment {
  const { child, min, max } = node

  if (max === 0) {
    return emptyFragment(builder)
  }

  const start = createState(builder)
  let current = start

  // Mandatory copies
  for (let i = 0; i < min; i++) {
    const copy = buildNodeAutomaton(builder, child)
    addEpsilon(builder, current, copy.start)
    current = copy.accept
  }

  const accept = createState(builder)

  if (max === undefined) {
    // Zero or more further copies: enter the loop or leave
    const loop = buildNodeAutomaton(builder, child)
    addEpsilon(builder, current, loop.start)
    addEpsilon(builder, current, accept)
    addEpsilon(builder, loop.accept, loop.start)
    addEpsilon(builder, loop.accept, accept)
    return { start, accept }
  }

  // Optional copies, each able to skip the rest
  for (let i = min; i < max; i++) {
    addEpsilon(builder, current, accept)
    const copy = buildNodeAutomaton(builder, child)
    addEpsilon(builder, current, copy.start)
    current = copy.accept
  }
  addEpsilon(builder, current, accept)

  return { start, accept }
}

/**
 * Get the minimum number of characters a pattern can match.
 *
 * @param node - Pattern AST
 * @returns Minimum match length
 *
 * @public
 */
export function getMinLength(node: PatternNode): number {
  switch (node.type) {
    case 'literal':
    case 'charclass':
      return 1

    case 'anchorStart':
    case 'anchorEnd':
      return 0

    case 'sequence':
      return node.children.reduce((sum, child) => sum + getMinLength(child), 0)

    case 'alternation':
      return Math.min(getMinLength(node.left), getMinLength(node.right))

    case 'group':
      return getMinLength(node.child)

    case 'quantifier':
      return node.min === 0 ? 0 : node.min * getMinLength(node.child)
  }
}

/**
 * Get the maximum number of characters a pattern can match.
 *
 * @param node - Pattern AST
 * @returns Maximum match length, or undefined if unbounded
 *
 * @public
 */
export function getMaxLength(node: PatternNode): number | undefined {
  switch (node.type) {
    case 'literal':
    case 'charclass':
      return 1

    case 'anchorStart':
    case 'anchorEnd':
      return 0

    case 'sequence': {
      let total = 0
      for (const child of node.children) {
        const max = getMaxLength(child)
        if (max === undefined) {
          return undefined
        }
        total += max
      }
      return total
    }

    case 'alternation': {
      const left = getMaxLength(node.left)
      const right = getMaxLength(node.right)
      return left === undefined || right === undefined ? undefined : Math.max(left, right)
    }

    case 'group':
      return getMaxLength(node.child)

    case 'quantifier': {
      if (node.max === 0) {
        return 0
      }
      const childMax = getMaxLength(node.child)
      if (childMax === 0) {
        return 0
      }
      if (node.max === undefined || childMax === undefined) {
        return undefined
      }
      return node.max * childMax
    }
  }
}

/**
 * Check if a pattern can match arbitrarily long text.
 *
 * @param node - Pattern AST
 * @returns true if the match length is unbounded
 *
 * @public
 */
export function isUnbounded(node: PatternNode): boolean {
  return getMaxLength(node) === undefined
}
