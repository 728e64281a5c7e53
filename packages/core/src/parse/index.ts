/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parsePattern } from './parser'
export { validatePattern, isValidPattern } from './validator'
export { classEscape, complementRanges, normalizeRanges } from './char-classes'
