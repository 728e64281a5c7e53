import { describe, it, expect } from 'vitest'

import { buildAutomaton, getMinLength, getMaxLength, isUnbounded } from './automaton-builder'
import { DEFAULT_OPTIONS } from './options'
import { parsePattern } from '../parse'
import { AutomatonLimitError } from '../types'

describe('buildAutomaton', () => {
  it('builds two states for a literal', () => {
    const automaton = buildAutomaton(parsePattern('a'))

    expect(automaton.states).toHaveLength(2)
    expect(automaton.start).toBe(0)
    expect(automaton.accept).toBe(1)
    expect(automaton.states[0].transitions).toEqual([{ type: 'char', char: 'a', target: 1 }])
    expect(automaton.states[1].transitions).toEqual([])
  })

  it('builds one state for the empty pattern', () => {
    const automaton = buildAutomaton(parsePattern(''))

    expect(automaton.states).toHaveLength(1)
    expect(automaton.start).toBe(automaton.accept)
  })

  it('chains a sequence with epsilon transitions', () => {
    const automaton = buildAutomaton(parsePattern('ab'))

    expect(automaton.states).toHaveLength(4)
    expect(automaton.start).toBe(0)
    expect(automaton.accept).toBe(3)
    expect(automaton.states[1].transitions).toEqual([{ type: 'epsilon', target: 2 }])
  })

  it('adds no states for a group', () => {
    expect(buildAutomaton(parsePattern('(ab)')).states).toHaveLength(4)
  })

  it('branches an alternation from a fresh start state', () => {
    const automaton = buildAutomaton(parsePattern('a|b'))

    expect(automaton.states).toHaveLength(6)
    expect(automaton.start).toBe(0)
    expect(automaton.accept).toBe(5)
    expect(automaton.states[0].transitions).toEqual([
      { type: 'epsilon', target: 1 },
      { type: 'epsilon', target: 3 },
    ])
    expect(automaton.states[2].transitions).toEqual([{ type: 'epsilon', target: 5 }])
    expect(automaton.states[4].transitions).toEqual([{ type: 'epsilon', target: 5 }])
  })

  it('loops a star back through epsilon transitions', () => {
    const automaton = buildAutomaton(parsePattern('a*'))

    expect(automaton.states).toHaveLength(4)
    expect(automaton.accept).toBe(1)
    expect(automaton.states[0].transitions).toEqual([
      { type: 'epsilon', target: 2 },
      { type: 'epsilon', target: 1 },
    ])
    expect(automaton.states[3].transitions).toEqual([
      { type: 'epsilon', target: 2 },
      { type: 'epsilon', target: 1 },
    ])
  })

  it('unrolls bounded repetition into copies', () => {
    // start, two mandatory copies, accept, one optional copy
    expect(buildAutomaton(parsePattern('a{2,3}')).states).toHaveLength(8)
  })

  it('builds an empty fragment for zero repetitions', () => {
    const automaton = buildAutomaton(parsePattern('a{0}'))

    expect(automaton.states).toHaveLength(1)
    expect(automaton.start).toBe(automaton.accept)
  })

  it('builds assertion transitions for anchors', () => {
    const automaton = buildAutomaton(parsePattern('$'))

    expect(automaton.states[0].transitions).toEqual([{ type: 'assertion', assertion: 'end', target: 1 }])
  })

  it('builds class transitions with a matcher', () => {
    const automaton = buildAutomaton(parsePattern('[a-c]'))
    const [transition] = automaton.states[0].transitions

    expect(transition.type).toBe('class')
    if (transition.type === 'class') {
      expect(transition.matcher.source).toBe('[a-c]')
      expect(transition.matcher.test('b')).toBe(true)
      expect(transition.matcher.test('d')).toBe(false)
    }
  })

  it('adds case variants for literals when ignoring case', () => {
    const automaton = buildAutomaton(parsePattern('a'), { ...DEFAULT_OPTIONS, ignoreCase: true })

    expect(automaton.states[0].transitions).toEqual([
      { type: 'char', char: 'a', target: 1 },
      { type: 'char', char: 'A', target: 1 },
    ])
  })

  it('throws when the state limit is exceeded', () => {
    let error: unknown
    try {
      buildAutomaton(parsePattern('a{100}'), { ...DEFAULT_OPTIONS, maxStates: 50 })
    } catch (e) {
      error = e
    }

    expect(error).toBeInstanceOf(AutomatonLimitError)
    if (error instanceof AutomatonLimitError) {
      expect(error.code).toBe('STATE_LIMIT')
      expect(error.limit).toBe(50)
      expect(error.actual).toBe(51)
    }
  })
})

describe('length bounds', () => {
  it.each([
    ['abc', 3, 3],
    ['a{2,3}', 2, 3],
    ['a+', 1, undefined],
    ['^$', 0, 0],
    ['ab|c', 1, 2],
    ['(a|bc)*', 0, undefined],
    ['()*', 0, 0],
    ['a{0}', 0, 0],
    ['[0-9]{4}', 4, 4],
  ])('%s has length %s..%s', (source, min, max) => {
    const ast = parsePattern(source)

    expect(getMinLength(ast)).toBe(min)
    expect(getMaxLength(ast)).toBe(max)
    expect(isUnbounded(ast)).toBe(max === undefined)
  })
})
