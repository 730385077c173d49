/**
 * Semantic flags fixed at compile time.
 *
 * @public
 */
export interface RegexFlags {
  /**
   * Compare symbols by their simple case forms. Literals match every symbol
   * with the same case fold (`σ` matches `ς` and `Σ`). Class ranges are tested
   * against the input's lower, upper and folded forms. Multi-code-point
   * mappings such as `ß` to `SS` are not applied.
   */
  readonly caseInsensitive?: boolean

  /** `^` and `$` also hold next to `\n` */
  readonly multiline?: boolean
}

/**
 * Ceilings a host can impose on a single match call.
 * All limits are optional - undefined values use defaults.
 * @public
 */
export interface MatchLimits {
  /** Maximum input length in UTF-16 code units (default: Infinity) */
  readonly maxInputLength?: number

  /** Maximum number of transition evaluations per call (default: Infinity) */
  readonly maxSteps?: number
}

/**
 * Logger interface for compile tracing.
 * @public
 */
export interface RegexLogger {
  /** Log informational messages (syntax errors) */
  info(message: string, data?: Record<string, unknown>): void
  /** Log debug messages (automaton statistics) */
  debug(message: string, data?: Record<string, unknown>): void
}

/**
 * Options accepted by `compile`.
 * @public
 */
export interface CompileOptions {
  readonly flags?: RegexFlags
  readonly limits?: MatchLimits
  readonly logger?: RegexLogger
}
