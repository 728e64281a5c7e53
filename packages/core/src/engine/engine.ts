/**
 * Public matching facade over a compiled pattern.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { CompiledPattern, EngineOptions, Match, Replacement, ResolvedEngineOptions } from '../types'
import { InvalidInputError } from '../types'
import { compilePattern, applyQuickReject, resolveOptions } from '../compile'
import { runAutomaton } from '../match'
import { automatonToDot, type DotOptions } from '../automaton'

const debugEngine = registerDebug('thompson-regex:engine')

const METACHARACTERS = /[\\^$.|?*+()[\]{}\-/]/g

/**
 * A compiled pattern with match, search, find-all, substitute and split.
 *
 * Compilation does all validation, so none of the matching methods throw
 * for a pattern reason: no match is reported as `null` or an empty result.
 * An engine holds no per-call state and can be shared freely.
 *
 * @example
 * ```ts
 * const engine = compile('\\d+')
 * engine.search('room 101')          // { start: 5, end: 8, value: '101' }
 * engine.sub('2 + 2', 'n')           // 'n + n'
 * [...engine.findAll('1a22b333')]    // three matches
 * ```
 *
 * @public
 */
export class Engine {
  /** Original pattern source */
  readonly pattern: string

  /** Options the pattern was compiled with */
  readonly options: ResolvedEngineOptions

  /** Parsed AST, automaton and quick-reject data */
  readonly compiled: CompiledPattern

  /**
   * @throws PatternSyntaxError if the pattern does not parse
   * @throws AutomatonLimitError if the automaton grows past `maxStates`
   * @throws InvalidInputError if the pattern is not a string or an option is invalid
   */
  constructor(pattern: string, options?: EngineOptions) {
    this.options = resolveOptions(options)
    this.compiled = compilePattern(pattern, this.options)
    this.pattern = pattern
  }

  /** Number of states in the compiled automaton. */
  get stateCount(): number {
    return this.compiled.automaton.states.length
  }

  /**
   * Match covering the whole text, or null.
   *
   * Use `search` to find a match anywhere in the text.
   */
  match(text: string): Match | null {
    assertText(text)
    const match = this.matchAt(text, 0)
    return match !== null && match.end === text.length ? match : null
  }

  /** Alias of {@link Engine.match}. */
  fullMatch(text: string): Match | null {
    return this.match(text)
  }

  /**
   * Leftmost match at or after `fromIndex`; among matches starting there,
   * the longest.
   */
  search(text: string, fromIndex = 0): Match | null {
    assertText(text)
    if (!Number.isInteger(fromIndex) || fromIndex < 0) {
      throw new InvalidInputError('fromIndex', 'fromIndex must be a non-negative integer')
    }

    for (let offset = fromIndex; offset <= text.length; offset++) {
      // Both filters only get stricter as the offset grows
      if (!applyQuickReject(text, offset, this.compiled.quickReject)) {
        break
      }
      const match = this.matchAt(text, offset)
      if (match !== null) {
        return match
      }
    }

    return null
  }

  /**
   * Check if the pattern matches anywhere in the text.
   */
  test(text: string): boolean {
    return this.search(text) !== null
  }

  /**
   * All non-overlapping matches, left to right.
   *
   * The result is lazy and can be iterated more than once; each iteration
   * searches again from the start. After an empty match the next search
   * begins one position further on, so patterns that match the empty
   * string still terminate.
   */
  findAll(text: string): Iterable<Match> {
    assertText(text)
    return {
      [Symbol.iterator]: () => this.iterateMatches(text),
    }
  }

  /**
   * Replace matches in `text`.
   *
   * Matches are found in the original text only, so replacement output is
   * never matched again.
   *
   * @param text - Text to rewrite
   * @param replacement - Literal replacement, or a function of each match
   * @param count - Maximum number of replacements; 0 replaces all
   * @returns The rewritten text
   */
  sub(text: string, replacement: Replacement, count = 0): string {
    assertText(text)
    assertCount(count, 'count')

    let result = ''
    let last = 0
    let replaced = 0

    for (const match of this.findAll(text)) {
      if (count > 0 && replaced >= count) {
        break
      }
      const value = typeof replacement === 'function' ? replacement(match) : replacement
      if (typeof value !== 'string') {
        throw new InvalidInputError('replacement', `Replacement must produce a string, got ${typeof value}`)
      }
      result += text.slice(last, match.start) + value
      last = match.end
      replaced++
    }

    debugEngine(`sub /${this.pattern}/: ${replaced} replacement(s)`)
    return result + text.slice(last)
  }

  /**
   * Split `text` around matches.
   *
   * @param text - Text to split
   * @param maxSplit - Maximum number of splits; 0 splits at every match
   * @returns The pieces between matches, in order
   */
  split(text: string, maxSplit = 0): string[] {
    assertText(text)
    assertCount(maxSplit, 'maxSplit')

    const parts: string[] = []
    let last = 0

    for (const match of this.findAll(text)) {
      if (maxSplit > 0 && parts.length >= maxSplit) {
        break
      }
      parts.push(text.slice(last, match.start))
      last = match.end
    }

    parts.push(text.slice(last))
    return parts
  }

  /**
   * Render the compiled automaton as Graphviz DOT.
   */
  toDot(options?: DotOptions): string {
    return automatonToDot(this.compiled.automaton, options)
  }

  toString(): string {
    return `/${this.pattern}/`
  }

  private matchAt(text: string, offset: number): Match | null {
    const end = runAutomaton(this.compiled.automaton, text, offset)
    return end === null ? null : { start: offset, end, value: text.slice(offset, end) }
  }

  private *iterateMatches(text: string): Generator<Match> {
    let position = 0
    while (position <= text.length) {
      const match = this.search(text, position)
      if (match === null) {
        return
      }
      yield match
      position = match.end > match.start ? match.end : match.end + 1
    }
  }
}

/**
 * Compile a pattern into an engine.
 *
 * @param pattern - Pattern source string
 * @param options - Engine options
 * @returns Engine ready for matching
 * @throws PatternSyntaxError if the pattern does not parse
 *
 * @public
 */
export function compile(pattern: string, options?: EngineOptions): Engine {
  return new Engine(pattern, options)
}

/**
 * Escape every metacharacter in `text` so that it matches literally.
 *
 * @public
 */
export function escapePattern(text: string): string {
  assertText(text)
  return text.replace(METACHARACTERS, '\\$&')
}

function assertText(text: unknown): asserts text is string {
  if (typeof text !== 'string') {
    throw new InvalidInputError('text', `Expected a string, got ${typeof text}`)
  }
}

function assertCount(value: number, argument: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidInputError(argument, `${argument} must be a non-negative integer`)
  }
}
