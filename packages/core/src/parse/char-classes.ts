/**
 * Predefined character classes and range arithmetic.
 * @packageDocumentation
 */

import type { CharClassNode, CharRange } from '../types'

/** Highest UTF-16 code unit. */
const MAX_CODE_UNIT = 0xffff

const DIGIT: readonly CharRange[] = [{ start: '0', end: '9' }]

const WORD: readonly CharRange[] = [
  { start: '0', end: '9' },
  { start: 'A', end: 'Z' },
  { start: '_', end: '_' },
  { start: 'a', end: 'z' },
]

// \t \n \v \f \r and space
const SPACE: readonly CharRange[] = [
  { start: '\t', end: '\r' },
  { start: ' ', end: ' ' },
]

const CLASS_ESCAPES: Readonly<Record<string, { ranges: readonly CharRange[]; negated: boolean }>> = {
  d: { ranges: DIGIT, negated: false },
  D: { ranges: DIGIT, negated: true },
  w: { ranges: WORD, negated: false },
  W: { ranges: WORD, negated: true },
  s: { ranges: SPACE, negated: false },
  S: { ranges: SPACE, negated: true },
}

/**
 * Check whether `letter` names a predefined class (`\d`, `\W`, ...).
 */
function isClassEscape(letter: string): boolean {
  return Object.prototype.hasOwnProperty.call(CLASS_ESCAPES, letter)
}

/**
 * Build the class node for a predefined class escape letter.
 *
 * @param letter - One of `dDwWsS`
 * @returns The desugared class, or undefined for any other letter
 *
 * @public
 */
export function classEscape(letter: string): CharClassNode | undefined {
  if (!isClassEscape(letter)) {
    return undefined
  }
  const entry = CLASS_ESCAPES[letter]
  return { type: 'charclass', negated: entry.negated, ranges: entry.ranges }
}

/**
 * The ranges a class node accepts, with negation folded in.
 *
 * Used when a negated escape such as `\D` appears inside a bracket
 * expression and has to be merged into a positive range list.
 */
export function effectiveRanges(node: CharClassNode): readonly CharRange[] {
  return node.negated ? complementRanges(node.ranges) : node.ranges
}

/**
 * Sort ranges and merge overlapping or adjacent ones.
 *
 * @public
 */
export function normalizeRanges(ranges: readonly CharRange[]): CharRange[] {
  const sorted = [...ranges].sort((a, b) => a.start.charCodeAt(0) - b.start.charCodeAt(0))
  const merged: CharRange[] = []

  for (const range of sorted) {
    const last = merged[merged.length - 1]
    if (last !== undefined && range.start.charCodeAt(0) <= last.end.charCodeAt(0) + 1) {
      if (range.end.charCodeAt(0) > last.end.charCodeAt(0)) {
        merged[merged.length - 1] = { start: last.start, end: range.end }
      }
    } else {
      merged.push(range)
    }
  }

  return merged
}

/**
 * Ranges covering every code unit not covered by `ranges`.
 *
 * @public
 */
export function complementRanges(ranges: readonly CharRange[]): CharRange[] {
  const result: CharRange[] = []
  let next = 0

  for (const range of normalizeRanges(ranges)) {
    const start = range.start.charCodeAt(0)
    if (start > next) {
      result.push({ start: String.fromCharCode(next), end: String.fromCharCode(start - 1) })
    }
    next = range.end.charCodeAt(0) + 1
  }

  if (next <= MAX_CODE_UNIT) {
    result.push({ start: String.fromCharCode(next), end: String.fromCharCode(MAX_CODE_UNIT) })
  }

  return result
}
