/**
 * Quick-reject filter construction.
 * @packageDocumentation
 */

import type { PatternNode, QuickRejectFilter } from '../types'
import { getMinLength } from './automaton-builder'

/**
 * Build quick-reject filters for a pattern.
 *
 * Quick-reject filters let a search skip start offsets where no match can
 * begin, before running the automaton there.
 *
 * @param root - Pattern AST
 * @returns Quick-reject filter configuration
 *
 * @public
 */
export function buildQuickRejectFilter(root: PatternNode): QuickRejectFilter {
  return {
    anchoredStart: isAnchoredStart(root),
    minLength: getMinLength(root),
  }
}

/**
 * Whether every path through the pattern passes `^` before consuming
 * anything, so a match can only begin at offset 0.
 *
 * Conservative: returns false whenever that is not obvious from the
 * leading element.
 */
function isAnchoredStart(node: PatternNode): boolean {
  switch (node.type) {
    case 'anchorStart':
      return true

    case 'literal':
    case 'charclass':
    case 'anchorEnd':
      return false

    case 'sequence':
      return node.children.length > 0 && isAnchoredStart(node.children[0])

    case 'alternation':
      return isAnchoredStart(node.left) && isAnchoredStart(node.right)

    case 'group':
      return isAnchoredStart(node.child)

    case 'quantifier':
      return node.min > 0 && isAnchoredStart(node.child)
  }
}

/**
 * Apply quick-reject filter to a start offset.
 *
 * @param text - Text being searched
 * @param offset - Candidate start offset
 * @param filter - Quick-reject filter
 * @returns false if no match can start at `offset`, true if one might
 *
 * @public
 */
export function applyQuickReject(text: string, offset: number, filter: QuickRejectFilter): boolean {
  if (filter.anchoredStart && offset > 0) {
    return false
  }

  return text.length - offset >= filter.minLength
}
