/**
 * Pattern validation - reports syntax problems without throwing.
 * @packageDocumentation
 */

import type { PatternError } from '../types'
import { PatternSyntaxError } from '../types'
import { parsePattern } from './parser'

/**
 * Validate a pattern against the supported dialect.
 *
 * Returns errors for:
 * - Unbalanced groups and brackets
 * - Malformed or misplaced quantifiers
 * - Unknown escape sequences and unsupported group syntax
 *
 * The parser stops at the first problem, so the result holds at most one
 * error. Errors other than syntax errors propagate.
 *
 * @param source - The pattern string to validate
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string): readonly PatternError[] {
  try {
    parsePattern(source)
    return []
  } catch (error) {
    if (error instanceof PatternSyntaxError) {
      return [error.toPatternError()]
    }
    throw error
  }
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param source - The pattern to check
 * @returns true if the pattern parses
 *
 * @public
 */
export function isValidPattern(source: string): boolean {
  return validatePattern(source).length === 0
}
