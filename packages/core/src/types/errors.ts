/**
 * Error codes for pattern and match failures.
 * @public
 */
export type RegexErrorCode =
  | 'UNCLOSED_GROUP' // (ab without )
  | 'UNMATCHED_PAREN' // ab) without (
  | 'UNCLOSED_CLASS' // [abc without ]
  | 'INVALID_RANGE' // [z-a] (reversed)
  | 'DANGLING_QUANTIFIER' // *a, a**, (+a)
  | 'EMPTY_BRANCH' // a| or |a
  | 'TRAILING_ESCAPE' // pattern ends with a lone backslash
  | 'INVALID_ESCAPE' // negated shorthand inside a class
  | 'NESTING_LIMIT' // groups nested deeper than MAX_NESTING_DEPTH
  | 'INPUT_LIMIT' // input longer than maxInputLength
  | 'STEP_LIMIT' // simulation exceeded maxSteps

/**
 * Error codes the parser can report.
 * @public
 */
export type SyntaxErrorCode = Exclude<RegexErrorCode, 'INPUT_LIMIT' | 'STEP_LIMIT'>

/**
 * A pattern syntax error with location information.
 *
 * Returned inside an `err` by `parseRegex` and `compile`; only the
 * `*OrThrow` variants throw it.
 *
 * @public
 */
export class RegexSyntaxError extends Error {
  /** Error classification code */
  readonly code: SyntaxErrorCode

  /** Code unit offset in the pattern where the error starts */
  readonly position: number

  /** Human-readable description without position */
  readonly reason: string

  /** Length of the problematic section */
  readonly length: number

  constructor(code: SyntaxErrorCode, reason: string, position: number, length = 1) {
    super(`${reason} at position ${position}`)
    this.name = 'RegexSyntaxError'
    this.code = code
    this.reason = reason
    this.position = position
    this.length = length
  }
}

/**
 * Error thrown when a match call exceeds a host-imposed ceiling.
 * @public
 */
export class MatchLimitError extends Error {
  /** Error classification code */
  readonly code: 'INPUT_LIMIT' | 'STEP_LIMIT'

  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(code: 'INPUT_LIMIT' | 'STEP_LIMIT', message: string, limit: number, actual: number) {
    super(message)
    this.name = 'MatchLimitError'
    this.code = code
    this.limit = limit
    this.actual = actual
  }
}
