import type { RegexFlags } from './options'

// =============================================================================
// REGEX AST
// =============================================================================

/**
 * Root of a parsed regular expression - the entry point for any parsed pattern.
 * @public
 */
export interface ParsedRegex {
  /** Original pattern string for error messages and debugging */
  readonly source: string

  /** Parsed structure */
  readonly root: RegexNode

  /** Flags the pattern was parsed under */
  readonly flags: RegexFlags
}

/**
 * A node in the regex AST.
 *
 * @example
 * "ab|c*" becomes:
 *   Alternate(Concat(Literal(a), Literal(b)), Star(Literal(c)))
 *
 * @public
 */
export type RegexNode =
  | LiteralNode
  | AnyCharNode
  | CharClassNode
  | ConcatNode
  | AlternateNode
  | StarNode
  | PlusNode
  | OptionalNode
  | AnchorStartNode
  | AnchorEndNode
  | EmptyNode

/**
 * A single literal code point.
 * @public
 */
export interface LiteralNode {
  readonly type: 'literal'
  readonly codePoint: number
}

/**
 * The `.` atom - matches every symbol.
 * @public
 */
export interface AnyCharNode {
  readonly type: 'any'
}

/**
 * A character class like [a-z] or [^0-9].
 *
 * Ranges are kept in source order and are not expanded into a set.
 *
 * @public
 */
export interface CharClassNode {
  readonly type: 'charclass'

  /** Whether this is a negated class ([^...]) */
  readonly negated: boolean

  /** Inclusive code point ranges; single characters are one-element ranges */
  readonly ranges: readonly CharRange[]
}

/**
 * An inclusive range of code points within a character class.
 * @public
 */
export interface CharRange {
  readonly start: number
  readonly end: number
}

/**
 * Implicit juxtaposition of two expressions.
 * @public
 */
export interface ConcatNode {
  readonly type: 'concat'
  readonly left: RegexNode
  readonly right: RegexNode
}

/**
 * `left|right`.
 * @public
 */
export interface AlternateNode {
  readonly type: 'alternate'
  readonly left: RegexNode
  readonly right: RegexNode
}

/**
 * `inner*` - zero or more.
 * @public
 */
export interface StarNode {
  readonly type: 'star'
  readonly inner: RegexNode
}

/**
 * `inner+` - one or more.
 * @public
 */
export interface PlusNode {
  readonly type: 'plus'
  readonly inner: RegexNode
}

/**
 * `inner?` - zero or one.
 * @public
 */
export interface OptionalNode {
  readonly type: 'optional'
  readonly inner: RegexNode
}

/**
 * `^` - zero-width, holds at the start of input (or of a line in multiline mode).
 * @public
 */
export interface AnchorStartNode {
  readonly type: 'anchor-start'
}

/**
 * `$` - zero-width, holds at the end of input (or of a line in multiline mode).
 * @public
 */
export interface AnchorEndNode {
  readonly type: 'anchor-end'
}

/**
 * Matches only the empty string (empty pattern, `()`).
 * @public
 */
export interface EmptyNode {
  readonly type: 'empty'
}
