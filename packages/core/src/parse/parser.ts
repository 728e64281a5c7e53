/**
 * Pattern parser - converts regular expression strings to AST.
 * @packageDocumentation
 */

import type {
  PatternNode,
  LiteralNode,
  CharClassNode,
  CharRange,
  QuantifierNode,
  PatternErrorCode,
} from '../types'
import { PatternSyntaxError, InvalidInputError } from '../types'
import { classEscape, effectiveRanges } from './char-classes'

/**
 * Parser state for tracking position.
 */
interface ParserState {
  source: string
  position: number
}

/**
 * Escapes that stand for a single control character.
 */
const CONTROL_ESCAPES: Readonly<Record<string, string>> = {
  t: '\t',
  n: '\n',
  r: '\r',
  f: '\f',
  v: '\v',
  '0': '\0',
}

/**
 * Characters that may be escaped to stand for themselves.
 */
const ESCAPABLE = '\\^$.|?*+()[]{}-/'

const QUANTIFIER_START = '*+?{'

/**
 * Result of reading one escape sequence.
 */
type EscapeResult =
  | { readonly kind: 'char'; readonly value: string }
  | { readonly kind: 'class'; readonly node: CharClassNode }

/**
 * Parse a pattern string into an AST.
 *
 * Parsing is exhaustive: the first problem found is thrown, and a returned
 * tree is always valid input for the compiler.
 *
 * @param source - The pattern string to parse
 * @returns Root node of the parsed pattern
 * @throws PatternSyntaxError on malformed patterns
 *
 * @public
 */
export function parsePattern(source: string): PatternNode {
  if (typeof source !== 'string') {
    throw new InvalidInputError('pattern', `Pattern must be a string, got ${typeof source}`)
  }

  const state: ParserState = { source, position: 0 }
  const root = parseAlternation(state)

  // Alternation only stops early at a ')' that has no matching '('
  if (state.position < source.length) {
    fail(state, 'UNMATCHED_PAREN', "Unmatched ')'", state.position)
  }

  return root
}

/**
 * Throw a syntax error located in the pattern being parsed.
 */
function fail(state: ParserState, code: PatternErrorCode, message: string, position: number, length = 1): never {
  throw new PatternSyntaxError(code, message, state.source, position, length)
}

function peek(state: ParserState, offset = 0): string | undefined {
  const index = state.position + offset
  return index < state.source.length ? state.source[index] : undefined
}

function atQuantifier(state: ParserState): boolean {
  const char = peek(state)
  return char !== undefined && QUANTIFIER_START.includes(char)
}

/**
 * alternation := concatenation ('|' alternation)?
 */
function parseAlternation(state: ParserState): PatternNode {
  const left = parseConcatenation(state)

  if (peek(state) !== '|') {
    return left
  }

  state.position++
  const right = parseAlternation(state)
  return { type: 'alternation', left, right }
}

/**
 * concatenation := quantified*
 *
 * A single element is returned as-is rather than wrapped in a sequence.
 */
function parseConcatenation(state: ParserState): PatternNode {
  const children: PatternNode[] = []

  for (let char = peek(state); char !== undefined && char !== '|' && char !== ')'; char = peek(state)) {
    if (atQuantifier(state)) {
      fail(state, 'NOTHING_TO_REPEAT', `Nothing to repeat before '${char}'`, state.position)
    }
    children.push(parseQuantified(state))
  }

  if (children.length === 1) {
    return children[0]
  }
  return { type: 'sequence', children }
}

/**
 * quantified := atom quantifier?
 */
function parseQuantified(state: ParserState): PatternNode {
  const atom = parseAtom(state)

  if (!atQuantifier(state)) {
    return atom
  }

  if (atom.type === 'anchorStart' || atom.type === 'anchorEnd') {
    fail(state, 'QUANTIFIED_ASSERTION', 'Cannot repeat a zero-width assertion', state.position)
  }

  const start = state.position
  const { min, max } = parseQuantifierSuffix(state)
  const node: QuantifierNode = { type: 'quantifier', child: atom, min, max }

  if (atQuantifier(state)) {
    fail(state, 'REPEATED_QUANTIFIER', 'Quantifier follows another quantifier', start, state.position - start + 1)
  }

  return node
}

/**
 * quantifier := '*' | '+' | '?' | '{' m '}' | '{' m ',' '}' | '{' m ',' n '}'
 */
function parseQuantifierSuffix(state: ParserState): { min: number; max: number | undefined } {
  const start = state.position
  const char = state.source[state.position++]

  switch (char) {
    case '*':
      return { min: 0, max: undefined }
    case '+':
      return { min: 1, max: undefined }
    case '?':
      return { min: 0, max: 1 }
  }

  // '{'
  const min = readInteger(state)
  if (min === undefined) {
    fail(state, 'INVALID_QUANTIFIER', 'Expected a non-negative integer after {', start, state.position - start + 1)
  }

  let max: number | undefined = min
  if (peek(state) === ',') {
    state.position++
    max = peek(state) === '}' ? undefined : readInteger(state)
    if (max === undefined && peek(state) !== '}') {
      const length = state.position - start + 1
      fail(state, 'INVALID_QUANTIFIER', 'Expected a non-negative integer or } after ,', start, length)
    }
  }

  if (peek(state) !== '}') {
    fail(state, 'INVALID_QUANTIFIER', 'Unterminated quantifier', start, state.position - start)
  }
  state.position++

  if (max !== undefined && min > max) {
    fail(state, 'INVALID_QUANTIFIER', `Quantifier minimum ${min} exceeds maximum ${max}`, start, state.position - start)
  }

  return { min, max }
}

/**
 * Read a run of decimal digits, or return undefined if there is none.
 *
 * @throws PatternSyntaxError if the digits do not fit a safe integer
 */
function readInteger(state: ParserState): number | undefined {
  const start = state.position
  for (let char = peek(state); char !== undefined && char >= '0' && char <= '9'; char = peek(state)) {
    state.position++
  }
  if (state.position === start) {
    return undefined
  }

  const value = parseInt(state.source.slice(start, state.position), 10)
  if (!Number.isSafeInteger(value)) {
    fail(state, 'INVALID_QUANTIFIER', 'Quantifier bound is too large', start, state.position - start)
  }
  return value
}

/**
 * atom := literal | '.' | class | group | '^' | '$' | escape
 */
function parseAtom(state: ParserState): PatternNode {
  const char = state.source[state.position]

  switch (char) {
    case '(':
      return parseGroup(state)

    case '[':
      return parseCharClass(state)

    case '.':
      state.position++
      return { type: 'charclass', negated: true, ranges: [], wildcard: true }

    case '^':
      state.position++
      return { type: 'anchorStart' }

    case '$':
      state.position++
      return { type: 'anchorEnd' }

    case '\\': {
      const escape = readEscape(state)
      return escape.kind === 'class' ? escape.node : literal(escape.value)
    }

    default:
      state.position++
      return literal(char)
  }
}

function literal(value: string): LiteralNode {
  return { type: 'literal', value }
}

/**
 * group := '(' ('?:')? alternation ')'
 */
function parseGroup(state: ParserState): PatternNode {
  const open = state.position
  state.position++

  if (peek(state) === '?') {
    if (peek(state, 1) !== ':') {
      fail(state, 'UNSUPPORTED_GROUP', 'Only (?:...) groups are supported', open, 3)
    }
    state.position += 2
  }

  const child = parseAlternation(state)

  if (peek(state) !== ')') {
    fail(state, 'UNCLOSED_GROUP', "Missing ')' for group", open, state.position - open)
  }
  state.position++

  return { type: 'group', child }
}

/**
 * Read an escape sequence starting at the backslash.
 */
function readEscape(state: ParserState): EscapeResult {
  const start = state.position
  const char = peek(state, 1)

  if (char === undefined) {
    fail(state, 'INVALID_ESCAPE', 'Pattern ends with a lone backslash', start)
  }
  state.position += 2

  const node = classEscape(char)
  if (node) {
    return { kind: 'class', node }
  }
  if (Object.prototype.hasOwnProperty.call(CONTROL_ESCAPES, char)) {
    return { kind: 'char', value: CONTROL_ESCAPES[char] }
  }
  if (ESCAPABLE.includes(char)) {
    return { kind: 'char', value: char }
  }

  return fail(state, 'INVALID_ESCAPE', `Unknown escape sequence \\${char}`, start, 2)
}

/**
 * Parse a character class [abc] or [a-z] or [^...].
 */
function parseCharClass(state: ParserState): CharClassNode {
  const start = state.position
  state.position++ // Skip opening [

  // Check for negation
  let negated = false
  if (peek(state) === '^') {
    negated = true
    state.position++
  }

  const ranges: CharRange[] = []
  let first = true

  for (;;) {
    const char = peek(state)

    if (char === undefined) {
      fail(state, 'UNCLOSED_BRACKET', 'Unclosed character class', start, state.source.length - start)
    }

    if (char === ']') {
      if (!first) {
        state.position++
        break
      }
      // ] as first char is literal, but only if something closes the class later
      if (!hasUnescapedClose(state.source, state.position + 1)) {
        fail(state, 'EMPTY_CHARCLASS', 'Empty character class', start, state.position - start + 1)
      }
    }
    first = false

    const low = readClassMember(state)
    if (low.kind === 'class') {
      if (peek(state) === '-' && peek(state, 1) !== undefined && peek(state, 1) !== ']') {
        fail(state, 'INVALID_RANGE', 'Character class escape cannot start a range', state.position - 2, 3)
      }
      ranges.push(...effectiveRanges(low.node))
      continue
    }

    // Check for range
    if (peek(state) === '-' && peek(state, 1) !== undefined && peek(state, 1) !== ']') {
      const rangeStart = state.position - 1
      state.position++ // Skip -
      const high = readClassMember(state)

      if (high.kind === 'class') {
        const length = state.position - rangeStart
        fail(state, 'INVALID_RANGE', 'Character class escape cannot end a range', rangeStart, length)
      }
      if (low.value.charCodeAt(0) > high.value.charCodeAt(0)) {
        fail(
          state,
          'INVALID_RANGE',
          `Invalid range [${low.value}-${high.value}]: start > end`,
          rangeStart,
          state.position - rangeStart,
        )
      }

      ranges.push({ start: low.value, end: high.value })
    } else {
      ranges.push({ start: low.value, end: low.value })
    }
  }

  return { type: 'charclass', negated, ranges }
}

/**
 * Whether an unescaped `]` occurs at or after `from`.
 */
function hasUnescapedClose(source: string, from: number): boolean {
  for (let i = from; i < source.length; i++) {
    if (source[i] === '\\') {
      i++
    } else if (source[i] === ']') {
      return true
    }
  }
  return false
}

/**
 * Read one member of a bracket expression: a plain character or an escape.
 */
function readClassMember(state: ParserState): EscapeResult {
  const char = state.source[state.position]
  if (char === '\\') {
    return readEscape(state)
  }
  state.position++
  return { kind: 'char', value: char }
}
