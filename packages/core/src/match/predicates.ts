/**
 * Predicate and anchor evaluation.
 * @packageDocumentation
 */

import type { RegexFlags, SymbolPredicate } from '../types'
import { rangesContain, caseForms, foldCase } from '../parse/char-classes'

const NEWLINE = 0x0a

/**
 * The forms of an input symbol a predicate is tested against.
 *
 * Without `caseInsensitive` this is just the symbol. With it, the simple
 * lower- and upper-case forms are added when they are single code points,
 * followed by the case-folded form that literals are built with.
 *
 * @public
 */
export function symbolVariants(codePoint: number, flags: RegexFlags): readonly number[] {
  if (!flags.caseInsensitive) {
    return [codePoint]
  }

  const variants = [codePoint]
  for (const form of [...caseForms(codePoint), foldCase(codePoint)]) {
    if (!variants.includes(form)) {
      variants.push(form)
    }
  }
  return variants
}

/**
 * Check if a predicate accepts a symbol, given the symbol's variants.
 *
 * A negated class accepts only when no variant is in its ranges.
 *
 * @param predicate - Transition predicate
 * @param variants - Output of `symbolVariants`
 *
 * @public
 */
export function evaluatePredicate(predicate: SymbolPredicate, variants: readonly number[]): boolean {
  switch (predicate.type) {
    case 'char':
      return variants.includes(predicate.codePoint)

    case 'any':
      return true

    case 'class': {
      const inClass = variants.some((variant) => rangesContain(predicate.ranges, variant))
      return predicate.negated ? !inClass : inClass
    }
  }
}

/**
 * Check if an anchor holds at a code unit offset.
 *
 * @public
 */
export function anchorHolds(anchor: 'start' | 'end', input: string, position: number, flags: RegexFlags): boolean {
  if (anchor === 'start') {
    return position === 0 || (flags.multiline === true && input.charCodeAt(position - 1) === NEWLINE)
  }
  return position === input.length || (flags.multiline === true && input.charCodeAt(position) === NEWLINE)
}
