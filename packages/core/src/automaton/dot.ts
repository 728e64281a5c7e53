/**
 * Graphviz export of compiled automata.
 * @packageDocumentation
 */

import type { Automaton, AutomatonTransition } from '../types'

/**
 * Options for DOT rendering.
 *
 * @public
 */
export interface DotOptions {
  /** Graph name (default: NFA) */
  name?: string
  /** Layout direction (default: LR) */
  rankdir?: 'LR' | 'TB'
}

/**
 * Render an automaton in Graphviz DOT format.
 *
 * States are visited breadth-first from the start state, so unreachable
 * states are left out. The accepting state is drawn as a double circle.
 * Reads the state table only.
 *
 * @param automaton - Compiled NFA
 * @param options - Rendering options
 * @returns DOT source, one statement per line
 *
 * @public
 */
export function automatonToDot(automaton: Automaton, options: DotOptions = {}): string {
  const lines = [
    `digraph ${options.name ?? 'NFA'} {`,
    `  rankdir=${options.rankdir ?? 'LR'};`,
    '  __start [shape=point];',
    `  __start -> ${automaton.start};`,
  ]

  const visited = new Set<number>([automaton.start])
  const queue = [automaton.start]

  for (let index = 0; index < queue.length; index++) {
    const stateId = queue[index]
    const shape = stateId === automaton.accept ? 'doublecircle' : 'circle'
    lines.push(`  ${stateId} [shape=${shape}];`)

    for (const transition of automaton.states[stateId].transitions) {
      lines.push(`  ${stateId} -> ${transition.target} [label="${escapeLabel(transitionLabel(transition))}"];`)
      if (!visited.has(transition.target)) {
        visited.add(transition.target)
        queue.push(transition.target)
      }
    }
  }

  lines.push('}')
  return lines.join('\n')
}

function transitionLabel(transition: AutomatonTransition): string {
  switch (transition.type) {
    case 'char':
      return printableChar(transition.char)
    case 'class':
      return transition.matcher.source
    case 'epsilon':
      return 'ε'
    case 'assertion':
      return transition.assertion === 'start' ? '^' : '$'
  }
}

function printableChar(char: string): string {
  const code = char.charCodeAt(0)
  return code < 0x20 || code === 0x7f ? '\\u' + code.toString(16).padStart(4, '0') : char
}

function escapeLabel(label: string): string {
  return label.replace(/[\\"]/g, '\\$&')
}
