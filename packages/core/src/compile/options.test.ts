import { describe, it, expect } from 'vitest'

import { resolveOptions, DEFAULT_OPTIONS, DEFAULT_MAX_STATES } from './options'
import { InvalidInputError } from '../types'

describe('resolveOptions', () => {
  it('returns defaults when no options are given', () => {
    expect(resolveOptions()).toBe(DEFAULT_OPTIONS)
    expect(DEFAULT_OPTIONS).toEqual({ ignoreCase: false, dotAll: false, maxStates: DEFAULT_MAX_STATES })
  })

  it('merges partial options over defaults', () => {
    expect(resolveOptions({ ignoreCase: true })).toEqual({ ignoreCase: true, dotAll: false, maxStates: 10_000 })
    expect(resolveOptions({ maxStates: 64 })).toEqual({ ignoreCase: false, dotAll: false, maxStates: 64 })
  })

  it('accepts an unlimited state budget', () => {
    expect(resolveOptions({ maxStates: Infinity }).maxStates).toBe(Infinity)
  })

  it.each([0, -5, 1.5, NaN])('rejects maxStates %s', (maxStates) => {
    expect(() => resolveOptions({ maxStates })).toThrow(InvalidInputError)
  })

  it('rejects options of the wrong type', () => {
    expect(() => resolveOptions(JSON.parse('{"ignoreCase":"yes"}'))).toThrow('Option ignoreCase must be a boolean')
    expect(() => resolveOptions(JSON.parse('{"dotAll":1}'))).toThrow('Option dotAll must be a boolean')
    expect(() => resolveOptions(JSON.parse('{"maxStates":"10"}'))).toThrow(InvalidInputError)
  })
})
