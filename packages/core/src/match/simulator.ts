/**
 * NFA simulation - runs a compiled automaton over input text.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { Automaton, AssertionKind } from '../types'

const debugMatch = registerDebug('thompson-regex:match')

/**
 * Find the longest match of the automaton starting at `startOffset`.
 *
 * Uses set-based simulation: every state the automaton could be in is
 * tracked at once, so each input character is examined once per active
 * state and no path is ever retried.
 *
 * @param automaton - Compiled NFA
 * @param input - Text to match against
 * @param startOffset - Offset where the match must begin
 * @returns End offset of the longest match, or null if none
 *
 * @public
 */
export function runAutomaton(automaton: Automaton, input: string, startOffset = 0): number | null {
  // Start with epsilon closure of the start state
  let currentStates = epsilonClosure(automaton, new Set([automaton.start]), startOffset, input.length)
  let lastAccept: number | null = currentStates.has(automaton.accept) ? startOffset : null

  // Process each character
  for (let position = startOffset; position < input.length; position++) {
    const char = input[position]
    const nextStates = new Set<number>()

    for (const stateId of currentStates) {
      for (const transition of automaton.states[stateId].transitions) {
        if (
          (transition.type === 'char' && transition.char === char) ||
          (transition.type === 'class' && transition.matcher.test(char))
        ) {
          nextStates.add(transition.target)
        }
      }
    }

    if (nextStates.size === 0) {
      break // No valid states - no longer match possible
    }

    // Compute epsilon closure of next states
    currentStates = epsilonClosure(automaton, nextStates, position + 1, input.length)

    if (debugMatch.enabled) {
      debugMatch(`'${char}' @ ${position} -> states [${[...currentStates].join(', ')}]`)
    }

    if (currentStates.has(automaton.accept)) {
      lastAccept = position + 1
    }
  }

  return lastAccept
}

/**
 * Compute epsilon closure of a set of states at a scan position.
 *
 * Includes all states reachable via epsilon transitions and via assertion
 * transitions whose position check holds at `position`. The visited set
 * guarantees termination on the epsilon cycles unbounded repetition
 * creates.
 *
 * @param automaton - Compiled NFA
 * @param states - Seed states
 * @param position - Current offset in the input
 * @param inputLength - Length of the input
 * @returns The closure, including the seed states
 *
 * @public
 */
export function epsilonClosure(
  automaton: Automaton,
  states: ReadonlySet<number>,
  position: number,
  inputLength: number,
): Set<number> {
  const closure = new Set(states)
  const worklist = [...states]

  for (let stateId = worklist.pop(); stateId !== undefined; stateId = worklist.pop()) {
    for (const transition of automaton.states[stateId].transitions) {
      if (
        transition.type === 'epsilon' ||
        (transition.type === 'assertion' && assertionHolds(transition.assertion, position, inputLength))
      ) {
        if (!closure.has(transition.target)) {
          closure.add(transition.target)
          worklist.push(transition.target)
        }
      }
    }
  }

  return closure
}

/**
 * Check a zero-width assertion at a position.
 */
function assertionHolds(assertion: AssertionKind, position: number, inputLength: number): boolean {
  switch (assertion) {
    case 'start':
      return position === 0

    case 'end':
      return position === inputLength
  }
}
