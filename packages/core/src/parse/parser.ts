/**
 * Regex parser - converts pattern strings to AST.
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow'

import type { ParsedRegex, RegexNode, CharRange, RegexFlags } from '../types'
import { RegexSyntaxError } from '../types'
import { shorthandClass, symbolAt, symbolWidth } from './char-classes'

/**
 * Deepest group nesting a pattern may have.
 *
 * Parsing and building recurse once per group level, so the ceiling keeps
 * both inside the call stack.
 *
 * @public
 */
export const MAX_NESTING_DEPTH = 500

/**
 * Parser state for tracking position.
 */
interface ParserState {
  source: string
  position: number
  /** Groups currently open */
  depth: number
}

/**
 * Result of reading one escape sequence.
 */
type Escape =
  | { readonly kind: 'literal'; readonly codePoint: number }
  | { readonly kind: 'class'; readonly ranges: readonly CharRange[]; readonly negated: boolean }

const EMPTY: RegexNode = { type: 'empty' }

const CONTROL_ESCAPES: Readonly<Record<string, number>> = {
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  f: 0x0c,
  v: 0x0b,
  '0': 0x00,
}

/**
 * Parse a pattern string into an AST.
 *
 * Parsing stops at the first syntax error.
 *
 * @param source - The pattern string to parse
 * @param flags - Flags recorded on the result
 * @returns Parsed regex, or the syntax error
 *
 * @public
 */
export function parseRegex(source: string, flags: RegexFlags = {}): Result<ParsedRegex, RegexSyntaxError> {
  try {
    return ok(parseRegexOrThrow(source, flags))
  } catch (e) {
    if (e instanceof RegexSyntaxError) {
      return err(e)
    }
    throw e
  }
}

/**
 * Parse a pattern string into an AST, throwing on invalid syntax.
 *
 * @throws RegexSyntaxError if the pattern is malformed
 *
 * @public
 */
export function parseRegexOrThrow(source: string, flags: RegexFlags = {}): ParsedRegex {
  const state: ParserState = { source, position: 0, depth: 0 }
  const root = parseAlternation(state)

  if (state.position < source.length) {
    // parseAlternation only stops early at a ')'
    throw new RegexSyntaxError('UNMATCHED_PAREN', "Unmatched ')'", state.position)
  }

  return { source, root, flags }
}

function peek(state: ParserState): string | undefined {
  return state.position < state.source.length ? state.source[state.position] : undefined
}

/**
 * alternation := concat ('|' concat)*
 */
function parseAlternation(state: ParserState): RegexNode {
  let left = parseConcat(state)

  while (peek(state) === '|') {
    const barPosition = state.position
    if (left === null) {
      throw new RegexSyntaxError('EMPTY_BRANCH', "Empty alternation branch before '|'", barPosition)
    }
    state.position++

    const right = parseConcat(state)
    if (right === null) {
      throw new RegexSyntaxError('EMPTY_BRANCH', "Empty alternation branch after '|'", barPosition)
    }
    left = { type: 'alternate', left, right }
  }

  return left ?? EMPTY
}

/**
 * concat := repeat*
 *
 * Returns null when the branch has no atoms.
 */
function parseConcat(state: ParserState): RegexNode | null {
  let node: RegexNode | null = null

  for (let char = peek(state); char !== undefined && char !== '|' && char !== ')'; char = peek(state)) {
    const repeated = parseRepeat(state)
    node = node === null ? repeated : { type: 'concat', left: node, right: repeated }
  }

  return node
}

function isQuantifier(char: string | undefined): char is '*' | '+' | '?' {
  return char === '*' || char === '+' || char === '?'
}

/**
 * repeat := atom ('*' | '+' | '?')?
 */
function parseRepeat(state: ParserState): RegexNode {
  if (isQuantifier(peek(state))) {
    throw new RegexSyntaxError('DANGLING_QUANTIFIER', 'Quantifier has nothing to repeat', state.position)
  }

  const atom = parseAtom(state)
  const quantifier = peek(state)

  if (!isQuantifier(quantifier)) {
    return atom
  }
  if (atom.type === 'anchor-start' || atom.type === 'anchor-end') {
    throw new RegexSyntaxError('DANGLING_QUANTIFIER', 'Quantifier cannot follow an anchor', state.position)
  }
  state.position++

  switch (quantifier) {
    case '*':
      return { type: 'star', inner: atom }
    case '+':
      return { type: 'plus', inner: atom }
    case '?':
      return { type: 'optional', inner: atom }
  }
}

/**
 * atom := literal | '.' | class | '(' alternation ')' | '^' | '$' | escape
 */
function parseAtom(state: ParserState): RegexNode {
  const start = state.position
  const char = state.source[start]

  switch (char) {
    case '(': {
      if (state.depth >= MAX_NESTING_DEPTH) {
        throw new RegexSyntaxError('NESTING_LIMIT', `Groups nested deeper than ${MAX_NESTING_DEPTH} levels`, start)
      }
      state.position++
      state.depth++
      const inner = parseAlternation(state)
      if (peek(state) !== ')') {
        throw new RegexSyntaxError('UNCLOSED_GROUP', "Unclosed group, expected ')'", start, state.source.length - start)
      }
      state.position++
      state.depth--
      return inner
    }

    case '[':
      return parseCharClass(state)

    case '.':
      state.position++
      return { type: 'any' }

    case '^':
      state.position++
      return { type: 'anchor-start' }

    case '$':
      state.position++
      return { type: 'anchor-end' }

    case '\\': {
      const escape = parseEscape(state)
      return escape.kind === 'literal'
        ? { type: 'literal', codePoint: escape.codePoint }
        : { type: 'charclass', ranges: escape.ranges, negated: escape.negated }
    }

    default:
      return { type: 'literal', codePoint: readCodePoint(state) }
  }
}

/**
 * Read one code point and advance past it (one or two code units).
 */
function readCodePoint(state: ParserState): number {
  const codePoint = symbolAt(state.source, state.position)
  state.position += symbolWidth(codePoint)
  return codePoint
}

/**
 * Parse an escape sequence starting at the backslash.
 */
function parseEscape(state: ParserState): Escape {
  const start = state.position
  if (start + 1 >= state.source.length) {
    throw new RegexSyntaxError('TRAILING_ESCAPE', 'Pattern ends with a lone backslash', start)
  }
  state.position++

  const letter = state.source[state.position]
  const control = CONTROL_ESCAPES[letter]
  if (control !== undefined) {
    state.position++
    return { kind: 'literal', codePoint: control }
  }

  const shorthand = shorthandClass(letter)
  if (shorthand !== undefined) {
    state.position++
    return { kind: 'class', ...shorthand }
  }

  return { kind: 'literal', codePoint: readCodePoint(state) }
}

/**
 * Parse a character class [abc], [a-z] or [^...].
 *
 * `]` as the first member and `-` as the first or last member are literals.
 */
function parseCharClass(state: ParserState): RegexNode {
  const { source } = state
  const start = state.position
  state.position++ // Skip opening [

  let negated = false
  if (peek(state) === '^') {
    negated = true
    state.position++
  }

  const ranges: CharRange[] = []
  let first = true

  while (state.position < source.length) {
    if (source[state.position] === ']' && !first) {
      state.position++
      return { type: 'charclass', negated, ranges }
    }
    first = false

    const memberStart = state.position
    const low = parseClassMember(state)
    if (low.kind === 'class') {
      ranges.push(...low.ranges)
      continue
    }

    // Range a-z, unless the '-' is the last member
    if (peek(state) === '-' && state.position + 1 < source.length && source[state.position + 1] !== ']') {
      state.position++
      const high = parseClassMember(state)
      if (high.kind === 'class') {
        throw new RegexSyntaxError(
          'INVALID_RANGE',
          'Range cannot end in a shorthand class',
          memberStart,
          state.position - memberStart,
        )
      }
      if (low.codePoint > high.codePoint) {
        throw new RegexSyntaxError(
          'INVALID_RANGE',
          `Invalid range [${source.slice(memberStart, state.position)}]: start > end`,
          memberStart,
          state.position - memberStart,
        )
      }
      ranges.push({ start: low.codePoint, end: high.codePoint })
    } else {
      ranges.push({ start: low.codePoint, end: low.codePoint })
    }
  }

  throw new RegexSyntaxError('UNCLOSED_CLASS', 'Unclosed character class', start, source.length - start)
}

/**
 * Parse one member inside a character class.
 */
function parseClassMember(state: ParserState): Escape {
  if (state.source[state.position] !== '\\') {
    return { kind: 'literal', codePoint: readCodePoint(state) }
  }

  const start = state.position
  const escape = parseEscape(state)
  if (escape.kind === 'class' && escape.negated) {
    throw new RegexSyntaxError(
      'INVALID_ESCAPE',
      'Negated shorthand class is not allowed inside a character class',
      start,
      state.position - start,
    )
  }
  return escape
}
