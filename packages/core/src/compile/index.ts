/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compilePattern } from './compiler'
export { buildAutomaton, getMinLength, getMaxLength, isUnbounded } from './automaton-builder'
export { buildQuickRejectFilter, applyQuickReject } from './quick-reject'
export { buildCharMatcher } from './char-matcher'
export { resolveOptions, DEFAULT_OPTIONS, DEFAULT_MAX_STATES } from './options'
