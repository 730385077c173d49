/**
 * Character class helpers shared by the parser and the builder.
 * @packageDocumentation
 */

import type { CharRange } from '../types'

/**
 * Highest Unicode code point.
 * @public
 */
export const MAX_CODE_POINT = 0x10ffff

const DIGIT: readonly CharRange[] = [{ start: 0x30, end: 0x39 }]

const WORD: readonly CharRange[] = [
  { start: 0x30, end: 0x39 }, // 0-9
  { start: 0x41, end: 0x5a }, // A-Z
  { start: 0x5f, end: 0x5f }, // _
  { start: 0x61, end: 0x7a }, // a-z
]

const SPACE: readonly CharRange[] = [
  { start: 0x09, end: 0x0d }, // \t \n \v \f \r
  { start: 0x20, end: 0x20 },
]

/**
 * Ranges for the ASCII shorthand classes `\d`, `\w` and `\s`.
 *
 * @param letter - Shorthand letter in either case
 * @returns Ranges and whether the shorthand is negated, or undefined if the
 * letter is not a shorthand
 *
 * @public
 */
export function shorthandClass(letter: string): { ranges: readonly CharRange[]; negated: boolean } | undefined {
  switch (letter) {
    case 'd':
      return { ranges: DIGIT, negated: false }
    case 'D':
      return { ranges: DIGIT, negated: true }
    case 'w':
      return { ranges: WORD, negated: false }
    case 'W':
      return { ranges: WORD, negated: true }
    case 's':
      return { ranges: SPACE, negated: false }
    case 'S':
      return { ranges: SPACE, negated: true }
    default:
      return undefined
  }
}

/**
 * Sort ranges and merge overlapping or adjacent ones.
 *
 * The result is suitable for binary search.
 *
 * @public
 */
export function normalizeRanges(ranges: readonly CharRange[]): CharRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end)
  const merged: CharRange[] = []

  for (const range of sorted) {
    const last = merged[merged.length - 1]
    if (last !== undefined && range.start <= last.end + 1) {
      if (range.end > last.end) {
        merged[merged.length - 1] = { start: last.start, end: range.end }
      }
    } else {
      merged.push({ start: range.start, end: range.end })
    }
  }

  return merged
}

/**
 * Code point starting at a code unit offset.
 *
 * @throws RangeError if the offset is outside the string
 *
 * @public
 */
export function symbolAt(input: string, offset: number): number {
  const codePoint = input.codePointAt(offset)
  if (codePoint === undefined) {
    throw new RangeError(`No symbol at offset ${offset}`)
  }
  return codePoint
}

/**
 * Number of code units a code point occupies.
 *
 * @public
 */
export function symbolWidth(codePoint: number): number {
  return codePoint > 0xffff ? 2 : 1
}

/**
 * Simple case mapping of a code point, or undefined when the mapped form is
 * more than one code point (`ß` upper-cases to `SS`).
 */
function simpleCase(codePoint: number, toCase: 'lower' | 'upper'): number | undefined {
  const char = String.fromCodePoint(codePoint)
  const mapped = toCase === 'lower' ? char.toLowerCase() : char.toUpperCase()
  const mappedCodePoint = mapped.codePointAt(0)
  if (mappedCodePoint === undefined || String.fromCodePoint(mappedCodePoint) !== mapped) {
    return undefined
  }
  return mappedCodePoint
}

/**
 * Case-fold a code point: the lower-case form of its upper-case form.
 *
 * Symbols that differ only in case fold to the same code point, including
 * sets with more than two members such as `σ`, `ς` and `Σ`.
 *
 * @public
 */
export function foldCase(codePoint: number): number {
  const upper = simpleCase(codePoint, 'upper') ?? codePoint
  return simpleCase(upper, 'lower') ?? upper
}

/**
 * Simple lower- and upper-case forms of a code point that are single code points.
 *
 * @public
 */
export function caseForms(codePoint: number): number[] {
  const forms: number[] = []
  for (const form of [simpleCase(codePoint, 'lower'), simpleCase(codePoint, 'upper')]) {
    if (form !== undefined) {
      forms.push(form)
    }
  }
  return forms
}

/**
 * Binary search for a code point in normalized ranges.
 *
 * @public
 */
export function rangesContain(ranges: readonly CharRange[], codePoint: number): boolean {
  let low = 0
  let high = ranges.length - 1

  while (low <= high) {
    const mid = (low + high) >>> 1
    const range = ranges[mid]
    if (codePoint < range.start) {
      high = mid - 1
    } else if (codePoint > range.end) {
      low = mid + 1
    } else {
      return true
    }
  }

  return false
}
