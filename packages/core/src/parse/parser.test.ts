import { describe, it, expect } from 'vitest'

import { parseRegex, parseRegexOrThrow, MAX_NESTING_DEPTH } from './parser'
import { RegexSyntaxError } from '../types'
import type { RegexNode } from '../types'

const lit = (char: string): RegexNode => ({ type: 'literal', codePoint: char.codePointAt(0) ?? -1 })

describe('parseRegex', () => {
  describe('basic patterns', () => {
    it('parses a single literal', () => {
      const pattern = parseRegexOrThrow('a')

      expect(pattern.source).toBe('a')
      expect(pattern.flags).toEqual({})
      expect(pattern.root).toEqual(lit('a'))
    })

    it('parses concatenation left-associatively', () => {
      expect(parseRegexOrThrow('abc').root).toEqual({
        type: 'concat',
        left: { type: 'concat', left: lit('a'), right: lit('b') },
        right: lit('c'),
      })
    })

    it('parses the empty pattern as empty', () => {
      expect(parseRegexOrThrow('').root).toEqual({ type: 'empty' })
    })

    it('parses an empty group as empty', () => {
      expect(parseRegexOrThrow('()').root).toEqual({ type: 'empty' })
    })

    it('reads astral symbols as one literal', () => {
      expect(parseRegexOrThrow('😀').root).toEqual({ type: 'literal', codePoint: 0x1f600 })
    })

    it('records flags on the result', () => {
      expect(parseRegexOrThrow('a', { caseInsensitive: true }).flags).toEqual({ caseInsensitive: true })
    })
  })

  describe('precedence', () => {
    it('binds alternation loosest', () => {
      expect(parseRegexOrThrow('ab|c').root).toEqual({
        type: 'alternate',
        left: { type: 'concat', left: lit('a'), right: lit('b') },
        right: lit('c'),
      })
    })

    it('binds quantifiers to the preceding atom only', () => {
      expect(parseRegexOrThrow('ab*').root).toEqual({
        type: 'concat',
        left: lit('a'),
        right: { type: 'star', inner: lit('b') },
      })
    })

    it('applies quantifiers to groups', () => {
      expect(parseRegexOrThrow('(ab)+').root).toEqual({
        type: 'plus',
        inner: { type: 'concat', left: lit('a'), right: lit('b') },
      })
    })

    it('parses each quantifier kind', () => {
      expect(parseRegexOrThrow('a*').root).toEqual({ type: 'star', inner: lit('a') })
      expect(parseRegexOrThrow('a+').root).toEqual({ type: 'plus', inner: lit('a') })
      expect(parseRegexOrThrow('a?').root).toEqual({ type: 'optional', inner: lit('a') })
    })

    it('nests alternation left-associatively', () => {
      expect(parseRegexOrThrow('a|b|c').root).toEqual({
        type: 'alternate',
        left: { type: 'alternate', left: lit('a'), right: lit('b') },
        right: lit('c'),
      })
    })
  })

  describe('atoms', () => {
    it('parses dot and anchors', () => {
      expect(parseRegexOrThrow('^.$').root).toEqual({
        type: 'concat',
        left: { type: 'concat', left: { type: 'anchor-start' }, right: { type: 'any' } },
        right: { type: 'anchor-end' },
      })
    })

    it('parses escaped metacharacters as literals', () => {
      expect(parseRegexOrThrow('\\.').root).toEqual(lit('.'))
      expect(parseRegexOrThrow('\\*').root).toEqual(lit('*'))
      expect(parseRegexOrThrow('\\\\').root).toEqual(lit('\\'))
    })

    it('parses control escapes', () => {
      expect(parseRegexOrThrow('\\n').root).toEqual({ type: 'literal', codePoint: 0x0a })
      expect(parseRegexOrThrow('\\t').root).toEqual({ type: 'literal', codePoint: 0x09 })
    })

    it('parses shorthand classes', () => {
      expect(parseRegexOrThrow('\\d').root).toEqual({
        type: 'charclass',
        negated: false,
        ranges: [{ start: 0x30, end: 0x39 }],
      })
      expect(parseRegexOrThrow('\\S').root).toEqual({
        type: 'charclass',
        negated: true,
        ranges: [
          { start: 0x09, end: 0x0d },
          { start: 0x20, end: 0x20 },
        ],
      })
    })

    it('treats a stray ] as a literal', () => {
      expect(parseRegexOrThrow(']').root).toEqual(lit(']'))
    })
  })

  describe('character classes', () => {
    it('parses ranges', () => {
      expect(parseRegexOrThrow('[a-c]').root).toEqual({
        type: 'charclass',
        negated: false,
        ranges: [{ start: 0x61, end: 0x63 }],
      })
    })

    it('parses negation and keeps source order', () => {
      expect(parseRegexOrThrow('[^a-z0]').root).toEqual({
        type: 'charclass',
        negated: true,
        ranges: [
          { start: 0x61, end: 0x7a },
          { start: 0x30, end: 0x30 },
        ],
      })
    })

    it('treats ] as first member literally', () => {
      expect(parseRegexOrThrow('[]a]').root).toEqual({
        type: 'charclass',
        negated: false,
        ranges: [
          { start: 0x5d, end: 0x5d },
          { start: 0x61, end: 0x61 },
        ],
      })
    })

    it('treats a trailing - literally', () => {
      expect(parseRegexOrThrow('[a-]').root).toEqual({
        type: 'charclass',
        negated: false,
        ranges: [
          { start: 0x61, end: 0x61 },
          { start: 0x2d, end: 0x2d },
        ],
      })
    })

    it('expands shorthand classes inside a class', () => {
      expect(parseRegexOrThrow('[\\d_]').root).toEqual({
        type: 'charclass',
        negated: false,
        ranges: [
          { start: 0x30, end: 0x39 },
          { start: 0x5f, end: 0x5f },
        ],
      })
    })

    it('allows escaped members', () => {
      expect(parseRegexOrThrow('[\\]]').root).toEqual({
        type: 'charclass',
        negated: false,
        ranges: [{ start: 0x5d, end: 0x5d }],
      })
    })
  })

  describe('syntax errors', () => {
    const cases: [string, string, number][] = [
      ['(', 'UNCLOSED_GROUP', 0],
      ['a(b', 'UNCLOSED_GROUP', 1],
      ['a)', 'UNMATCHED_PAREN', 1],
      ['(a))', 'UNMATCHED_PAREN', 3],
      ['[a-', 'UNCLOSED_CLASS', 0],
      ['[]', 'UNCLOSED_CLASS', 0],
      ['*a', 'DANGLING_QUANTIFIER', 0],
      ['a**', 'DANGLING_QUANTIFIER', 2],
      ['(+a)', 'DANGLING_QUANTIFIER', 1],
      ['^*', 'DANGLING_QUANTIFIER', 1],
      ['a|*', 'DANGLING_QUANTIFIER', 2],
      ['a|', 'EMPTY_BRANCH', 1],
      ['|a', 'EMPTY_BRANCH', 0],
      ['(a|)', 'EMPTY_BRANCH', 2],
      ['[z-a]', 'INVALID_RANGE', 1],
      ['a\\', 'TRAILING_ESCAPE', 1],
      ['[\\D]', 'INVALID_ESCAPE', 1],
    ]

    for (const [source, code, position] of cases) {
      it(`rejects ${JSON.stringify(source)} with ${code}`, () => {
        const result = parseRegex(source)

        expect(result.isErr()).toBe(true)
        if (result.isErr()) {
          expect(result.error).toBeInstanceOf(RegexSyntaxError)
          expect(result.error.code).toBe(code)
          expect(result.error.position).toBe(position)
        }
      })
    }

    it('reports position and reason in the message', () => {
      const result = parseRegex('(')

      expect(result.isErr() && result.error.message).toBe("Unclosed group, expected ')' at position 0")
      expect(result.isErr() && result.error.reason).toBe("Unclosed group, expected ')'")
    })

    it('reports the length of an unclosed class', () => {
      const result = parseRegex('x[a-')

      expect(result.isErr() && result.error.position).toBe(1)
      expect(result.isErr() && result.error.length).toBe(3)
    })

    it('rejects groups nested past the depth ceiling', () => {
      for (const close of [')', ')*']) {
        const result = parseRegex('('.repeat(3000) + 'a' + close.repeat(3000))

        expect(result.isErr() && result.error.code).toBe('NESTING_LIMIT')
        expect(result.isErr() && result.error.position).toBe(MAX_NESTING_DEPTH)
      }
    })

    it('accepts groups nested exactly to the ceiling', () => {
      const result = parseRegex('('.repeat(MAX_NESTING_DEPTH) + 'a' + ')'.repeat(MAX_NESTING_DEPTH))

      expect(result.isOk() && result.value.root).toEqual({ type: 'literal', codePoint: 0x61 })
    })

    it('throws from parseRegexOrThrow', () => {
      expect(() => parseRegexOrThrow('[a-')).toThrow(RegexSyntaxError)
    })
  })
})
