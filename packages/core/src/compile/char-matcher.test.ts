import { describe, it, expect } from 'vitest'

import { buildCharMatcher, caseVariants } from './char-matcher'
import { DEFAULT_OPTIONS } from './options'
import type { CharClassNode } from '../types'

const lowerAtoC: CharClassNode = { type: 'charclass', negated: false, ranges: [{ start: 'a', end: 'c' }] }
const notDigit: CharClassNode = { type: 'charclass', negated: true, ranges: [{ start: '0', end: '9' }] }
const wildcard: CharClassNode = { type: 'charclass', negated: true, ranges: [], wildcard: true }

describe('buildCharMatcher', () => {
  it('tests range membership', () => {
    const matcher = buildCharMatcher(lowerAtoC, DEFAULT_OPTIONS)

    expect(matcher.test('a')).toBe(true)
    expect(matcher.test('c')).toBe(true)
    expect(matcher.test('d')).toBe(false)
    expect(matcher.test('B')).toBe(false)
    expect(matcher.source).toBe('[a-c]')
  })

  it('applies negation', () => {
    const matcher = buildCharMatcher(notDigit, DEFAULT_OPTIONS)

    expect(matcher.test('x')).toBe(true)
    expect(matcher.test('5')).toBe(false)
    expect(matcher.source).toBe('[^0-9]')
  })

  it('searches many ranges', () => {
    const node: CharClassNode = {
      type: 'charclass',
      negated: false,
      ranges: [
        { start: 'x', end: 'z' },
        { start: '0', end: '2' },
        { start: 'm', end: 'm' },
        { start: 'A', end: 'C' },
      ],
    }
    const matcher = buildCharMatcher(node, DEFAULT_OPTIONS)

    expect(['0', '2', 'B', 'm', 'y'].every((char) => matcher.test(char))).toBe(true)
    expect(['3', 'D', 'l', 'n', 'w'].some((char) => matcher.test(char))).toBe(false)
    expect(matcher.source).toBe('[0-2A-Cmx-z]')
  })

  it('excludes newline from the wildcard by default', () => {
    const matcher = buildCharMatcher(wildcard, DEFAULT_OPTIONS)

    expect(matcher.test('a')).toBe(true)
    expect(matcher.test('\r')).toBe(true)
    expect(matcher.test('\n')).toBe(false)
    expect(matcher.source).toBe('[^\\n]')
  })

  it('matches newline with the wildcard under dotAll', () => {
    const matcher = buildCharMatcher(wildcard, { ...DEFAULT_OPTIONS, dotAll: true })

    expect(matcher.test('\n')).toBe(true)
    expect(matcher.source).toBe('.')
  })

  it('matches either case when ignoring case', () => {
    const options = { ...DEFAULT_OPTIONS, ignoreCase: true }

    expect(buildCharMatcher(lowerAtoC, options).test('B')).toBe(true)

    const notA: CharClassNode = { type: 'charclass', negated: true, ranges: [{ start: 'a', end: 'a' }] }
    expect(buildCharMatcher(notA, options).test('A')).toBe(false)
    expect(buildCharMatcher(notA, options).test('b')).toBe(true)
  })

  it('escapes class metacharacters and control characters in the source', () => {
    const node: CharClassNode = {
      type: 'charclass',
      negated: false,
      ranges: [
        { start: ']', end: ']' },
        { start: '-', end: '-' },
        { start: '\t', end: '\t' },
      ],
    }

    expect(buildCharMatcher(node, DEFAULT_OPTIONS).source).toBe('[\\u0009\\-\\]]')
  })
})

describe('caseVariants', () => {
  it('returns both cases of a letter', () => {
    expect(caseVariants('a')).toEqual(['a', 'A'])
    expect(caseVariants('Q')).toEqual(['Q', 'q'])
  })

  it('returns only the character itself when it has no case', () => {
    expect(caseVariants('1')).toEqual(['1'])
    expect(caseVariants('_')).toEqual(['_'])
  })
})
