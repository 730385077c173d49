import { describe, it, expect, vi } from 'vitest'

import { compile, compileOrThrow, compilePattern } from './compiler'
import { parseRegexOrThrow, MAX_NESTING_DEPTH } from '../parse'
import { RegexSyntaxError } from '../types'

describe('compile', () => {
  it('returns the compiled regex on success', () => {
    const result = compile('a(b|c)*')

    expect(result.isOk()).toBe(true)
    if (result.isOk()) {
      expect(result.value.source).toBe('a(b|c)*')
      expect(result.value.minLength).toBe(1)
      expect(result.value.maxLength).toBeUndefined()
      expect(result.value.stateCount).toBe(result.value.automaton.states.length)
      expect(result.value.matches('abcb')).toBe(true)
    }
  })

  it('returns the syntax error on failure', () => {
    const result = compile('a(b')

    expect(result.isErr()).toBe(true)
    if (result.isErr()) {
      expect(result.error.code).toBe('UNCLOSED_GROUP')
      expect(result.error.position).toBe(1)
    }
  })

  it('rejects malformed patterns before building anything', () => {
    const codes = ['(', '[a-', '*a'].map((source) => {
      const result = compile(source)
      return result.isErr() ? [result.error.code, result.error.position] : 'compiled'
    })

    expect(codes).toEqual([
      ['UNCLOSED_GROUP', 0],
      ['UNCLOSED_CLASS', 0],
      ['DANGLING_QUANTIFIER', 0],
    ])
  })

  it('returns an error instead of overflowing on deep nesting', () => {
    const result = compile('('.repeat(3000) + 'a' + ')*'.repeat(3000))

    expect(result.isErr() && result.error.code).toBe('NESTING_LIMIT')
  })

  it('builds and matches patterns nested to the ceiling', () => {
    const compiled = compileOrThrow('('.repeat(MAX_NESTING_DEPTH) + 'a' + ')*'.repeat(MAX_NESTING_DEPTH))

    expect(compiled.stateCount).toBe(2 + 2 * MAX_NESTING_DEPTH)
    expect(compiled.maxLength).toBeUndefined()
    expect(compiled.matches('aaa')).toBe(true)
    expect(compiled.matches('ab')).toBe(false)
  })

  it('passes flags through to the automaton', () => {
    const compiled = compileOrThrow('abc', { flags: { caseInsensitive: true } })

    expect(compiled.flags).toEqual({ caseInsensitive: true })
    expect(compiled.automaton.flags).toEqual({ caseInsensitive: true })
    expect(compiled.matches('aBc')).toBe(true)
  })

  it('resolves limits once at compile time', () => {
    const compiled = compileOrThrow('a', { limits: { maxSteps: 10 } })

    expect(compiled.limits).toEqual({ maxInputLength: Number.POSITIVE_INFINITY, maxSteps: 10 })
  })

  it('logs automaton stats after compiling', () => {
    const logger = { info: vi.fn(), debug: vi.fn() }

    compile('a|b', { logger })

    expect(logger.debug).toHaveBeenCalledWith('compiled', {
      source: 'a|b',
      states: 6,
      symbolTransitions: 2,
      epsilonTransitions: 4,
      assertTransitions: 0,
    })
    expect(logger.info).not.toHaveBeenCalled()
  })

  it('logs syntax errors', () => {
    const logger = { info: vi.fn(), debug: vi.fn() }

    compile('(', { logger })

    expect(logger.info).toHaveBeenCalledWith('syntax error', { source: '(', code: 'UNCLOSED_GROUP', position: 0 })
    expect(logger.debug).not.toHaveBeenCalled()
  })
})

describe('compileOrThrow', () => {
  it('throws the syntax error', () => {
    expect(() => compileOrThrow('[z-a]')).toThrow(RegexSyntaxError)
    expect(() => compileOrThrow('[z-a]')).toThrow('Invalid range [z-a]: start > end at position 1')
  })
})

describe('compilePattern', () => {
  it('returns a frozen object', () => {
    const compiled = compilePattern(parseRegexOrThrow('ab'))

    expect(Object.isFrozen(compiled)).toBe(true)
    expect(compiled.quickReject).toEqual({ minLength: 2, maxLength: 2, requiredPrefix: 'ab' })
  })

  it('exposes every match operation', () => {
    const compiled = compilePattern(parseRegexOrThrow('b+'))

    expect(compiled.matches('bb')).toBe(true)
    expect(compiled.test('abba')).toBe(true)
    expect(compiled.find('abba')).toEqual({ start: 1, end: 3, text: 'bb' })
    expect(compiled.find('abbab', 3)).toEqual({ start: 4, end: 5, text: 'b' })
    expect(compiled.find('abba', -2)).toEqual({ start: 1, end: 3, text: 'bb' })
    expect(compiled.findAll('babb')).toEqual([
      { start: 0, end: 1, text: 'b' },
      { start: 2, end: 4, text: 'bb' },
    ])
  })
})
