/**
 * Pattern compiler - compiles pattern source to efficient matching form.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { CompiledPattern, EngineOptions } from '../types'
import { parsePattern } from '../parse'
import { buildAutomaton, getMinLength, getMaxLength } from './automaton-builder'
import { buildQuickRejectFilter } from './quick-reject'
import { resolveOptions } from './options'

const debugCompile = registerDebug('thompson-regex:compile')

/**
 * Compile a pattern to an efficient matching form.
 *
 * The compiled pattern includes:
 * - Original source and AST for debugging/analysis
 * - Quick-reject filters for skipping impossible start offsets
 * - Thompson NFA for full matching
 * - Length bounds
 *
 * @param source - Pattern source string
 * @param options - Engine options
 * @returns Compiled pattern ready for matching
 * @throws PatternSyntaxError if the pattern does not parse
 * @throws AutomatonLimitError if the automaton grows past `maxStates`
 *
 * @public
 */
export function compilePattern(source: string, options?: EngineOptions): CompiledPattern {
  const resolved = resolveOptions(options)
  const ast = parsePattern(source)
  const automaton = buildAutomaton(ast, resolved)

  debugCompile(`built automaton with ${automaton.states.length} states for /${source}/`)

  return {
    source,
    ast,
    quickReject: buildQuickRejectFilter(ast),
    automaton,
    minLength: getMinLength(ast),
    maxLength: getMaxLength(ast),
  }
}
