/**
 * Property tests over generated patterns.
 *
 * Patterns are built from a small token set so a good share of them parse;
 * inputs use the same two letters the patterns mention.
 */

import fc from 'fast-check'
import { describe, expect, it } from 'vitest'

import { compile, compileOrThrow } from './compile'
import { findWitness, isEmpty } from './automaton'
import type { CompiledRegex } from './types'

const TOKENS = ['a', 'b', 'a', 'b', '.', '|', '*', '+', '?', '(', ')', '^', '$', '[ab]', '[^a]'] as const

const patternArb = fc.array(fc.constantFrom(...TOKENS), { maxLength: 8 }).map((tokens) => tokens.join(''))
const inputArb = fc.array(fc.constantFrom('a', 'b'), { maxLength: 8 }).map((chars) => chars.join(''))

function compiled(source: string): CompiledRegex | undefined {
  const result = compile(source)
  return result.isOk() ? result.value : undefined
}

function nativeRegExp(source: string): RegExp | undefined {
  try {
    return new RegExp(source)
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined
    }
    throw error
  }
}

describe('generated patterns', () => {
  it('agree with RegExp on full matches', () => {
    fc.assert(
      fc.property(patternArb, inputArb, (source, input) => {
        const regex = compiled(source)
        const native = nativeRegExp(`^(?:${source})$`)
        fc.pre(regex !== undefined && native !== undefined)

        expect(regex?.matches(input)).toBe(native?.test(input))
      }),
    )
  })

  it('agree with RegExp on substring search', () => {
    fc.assert(
      fc.property(patternArb, inputArb, (source, input) => {
        const regex = compiled(source)
        const native = nativeRegExp(source)
        fc.pre(regex !== undefined && native !== undefined)

        expect(regex?.test(input)).toBe(native?.test(input))
      }),
    )
  })

  it('compile deterministically', () => {
    fc.assert(
      fc.property(patternArb, fc.array(inputArb, { maxLength: 5 }), (source, inputs) => {
        const first = compiled(source)
        fc.pre(first !== undefined)
        const second = compileOrThrow(source)

        expect(second.stateCount).toBe(first?.stateCount)
        for (const input of inputs) {
          expect(second.matches(input)).toBe(first?.matches(input))
        }
      }),
    )
  })

  it('give the same answer on repeated matches', () => {
    fc.assert(
      fc.property(patternArb, inputArb, (source, input) => {
        const regex = compiled(source)
        fc.pre(regex !== undefined)

        expect(regex?.matches(input)).toBe(regex?.matches(input))
        expect(regex?.find(input)).toEqual(regex?.find(input))
      }),
    )
  })

  it('accept their own witness', () => {
    fc.assert(
      fc.property(patternArb, (source) => {
        const regex = compiled(source)
        fc.pre(regex !== undefined)
        const witness = regex === undefined ? undefined : findWitness(regex.automaton)

        if (witness !== undefined) {
          expect(regex?.matches(witness)).toBe(true)
        }
      }),
    )
  })

  it('are empty once a start anchor follows a symbol', () => {
    fc.assert(
      fc.property(patternArb, inputArb, (inner, input) => {
        const regex = compiled(`(${inner})a^`)
        fc.pre(compiled(inner) !== undefined && regex !== undefined)

        expect(regex && isEmpty(regex.automaton)).toBe(true)
        expect(regex?.test(input)).toBe(false)
      }),
    )
  })

  it('find spans that match in full', () => {
    fc.assert(
      fc.property(patternArb, inputArb, (source, input) => {
        const regex = compiled(source)
        fc.pre(regex !== undefined && !source.includes('^') && !source.includes('$'))
        const span = regex?.find(input)

        if (span) {
          expect(input.slice(span.start, span.end)).toBe(span.text)
          expect(regex?.matches(span.text)).toBe(true)
        }
      }),
    )
  })
})
