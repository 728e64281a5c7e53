import { describe, it, expect } from 'vitest'

import { automatonToDot } from './dot'
import { compilePattern } from '../compile'

function dotFor(source: string): string {
  return automatonToDot(compilePattern(source).automaton)
}

describe('automatonToDot', () => {
  it('renders a single literal', () => {
    expect(dotFor('a')).toBe(
      [
        'digraph NFA {',
        '  rankdir=LR;',
        '  __start [shape=point];',
        '  __start -> 0;',
        '  0 [shape=circle];',
        '  0 -> 1 [label="a"];',
        '  1 [shape=doublecircle];',
        '}',
      ].join('\n'),
    )
  })

  it('visits states breadth-first and labels epsilon edges', () => {
    expect(dotFor('a*').split('\n')).toEqual([
      'digraph NFA {',
      '  rankdir=LR;',
      '  __start [shape=point];',
      '  __start -> 0;',
      '  0 [shape=circle];',
      '  0 -> 2 [label="ε"];',
      '  0 -> 1 [label="ε"];',
      '  2 [shape=circle];',
      '  2 -> 3 [label="a"];',
      '  1 [shape=doublecircle];',
      '  3 [shape=circle];',
      '  3 -> 2 [label="ε"];',
      '  3 -> 1 [label="ε"];',
      '}',
    ])
  })

  it('labels classes with their source', () => {
    expect(dotFor('[0-9]')).toContain('  0 -> 1 [label="[0-9]"];')
    expect(dotFor('.')).toContain('  0 -> 1 [label="[^\\\\n]"];')
  })

  it('labels assertions', () => {
    expect(dotFor('^')).toContain('  0 -> 1 [label="^"];')
    expect(dotFor('$')).toContain('  0 -> 1 [label="$"];')
  })

  it('escapes quotes and shows control characters as code units', () => {
    expect(dotFor('"')).toContain('  0 -> 1 [label="\\""];')
    expect(dotFor('\\t')).toContain('  0 -> 1 [label="\\\\u0009"];')
  })

  it('applies graph name and direction', () => {
    const lines = automatonToDot(compilePattern('a').automaton, { name: 'Digits', rankdir: 'TB' }).split('\n')

    expect(lines[0]).toBe('digraph Digits {')
    expect(lines[1]).toBe('  rankdir=TB;')
  })
})
