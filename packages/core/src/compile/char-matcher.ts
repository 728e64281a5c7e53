/**
 * Character class predicates.
 * @packageDocumentation
 */

import type { CharClassNode, CharMatcher, CharRange, ResolvedEngineOptions } from '../types'
import { normalizeRanges } from '../parse/char-classes'

const NEWLINE: readonly CharRange[] = [{ start: '\n', end: '\n' }]

/**
 * Build the membership predicate for a class node.
 *
 * Ranges are sorted and merged once here; each test is a binary search.
 * Negation is applied to the result rather than by complementing the
 * ranges, so `[^x]` costs the same as `[x]`.
 *
 * @param node - Parsed character class
 * @param options - Resolved engine options (`dotAll`, `ignoreCase`)
 * @returns Predicate plus a printable source for debugging
 *
 * @public
 */
export function buildCharMatcher(node: CharClassNode, options: ResolvedEngineOptions): CharMatcher {
  const ranges = node.wildcard ? (options.dotAll ? [] : NEWLINE) : node.ranges
  const merged = normalizeRanges(ranges)
  const lows = merged.map((range) => range.start.charCodeAt(0))
  const highs = merged.map((range) => range.end.charCodeAt(0))

  const contains = (char: string): boolean => {
    const code = char.charCodeAt(0)
    let lo = 0
    let hi = lows.length - 1
    while (lo <= hi) {
      const mid = (lo + hi) >> 1
      if (code < lows[mid]) {
        hi = mid - 1
      } else if (code > highs[mid]) {
        lo = mid + 1
      } else {
        return true
      }
    }
    return false
  }

  const member = options.ignoreCase
    ? (char: string): boolean => caseVariants(char).some(contains)
    : contains

  return {
    test: node.negated ? (char) => !member(char) : member,
    source: node.wildcard ? (options.dotAll ? '.' : '[^\\n]') : classToString(node.negated, merged),
  }
}

/**
 * The code unit itself plus its single-unit lower and upper case forms.
 */
export function caseVariants(char: string): string[] {
  const variants = [char]
  for (const folded of [char.toLowerCase(), char.toUpperCase()]) {
    if (folded.length === 1 && !variants.includes(folded)) {
      variants.push(folded)
    }
  }
  return variants
}

/**
 * Render ranges back to bracket syntax.
 */
function classToString(negated: boolean, ranges: readonly CharRange[]): string {
  let s = negated ? '[^' : '['
  for (const range of ranges) {
    s += escapeClassChar(range.start)
    if (range.end !== range.start) {
      s += '-' + escapeClassChar(range.end)
    }
  }
  return s + ']'
}

function escapeClassChar(char: string): string {
  const code = char.charCodeAt(0)
  if (code < 0x20 || code > 0x7e) {
    return '\\u' + code.toString(16).padStart(4, '0')
  }
  return /[\\\]^-]/.test(char) ? '\\' + char : char
}
