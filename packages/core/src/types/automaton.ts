import type { ParsedRegex, CharRange } from './ast'
import type { MatchLimits, RegexFlags } from './options'

// =============================================================================
// COMPILED REGEX
// =============================================================================

/**
 * A compiled pattern ready for matching.
 *
 * Owned by the caller of `compile` and shared read-only by every match
 * call; nothing in it changes after construction.
 *
 * @public
 */
export interface CompiledRegex {
  /** Original source pattern */
  readonly source: string

  /** Flags the pattern was compiled with */
  readonly flags: RegexFlags

  /** Parsed AST */
  readonly ast: ParsedRegex

  /** Thompson NFA used by every match call */
  readonly automaton: RegexAutomaton

  /** Necessary conditions checked before full-match simulation */
  readonly quickReject: QuickRejectFilter

  /** Limits applied to every match call */
  readonly limits: Required<MatchLimits>

  /** Minimum number of code points an accepted input has */
  readonly minLength: number

  /** Maximum number of code points (undefined if unbounded) */
  readonly maxLength?: number

  /** Number of states in the automaton */
  readonly stateCount: number

  /** Does the whole input match? */
  matches(input: string): boolean

  /** Leftmost-longest match at or after `from` */
  find(input: string, from?: number): MatchSpan | null

  /** All non-overlapping leftmost-longest matches */
  findAll(input: string): MatchSpan[]

  /** Does any substring match? */
  test(input: string): boolean
}

/**
 * Quick rejection filters for fast input elimination.
 * @public
 */
export interface QuickRejectFilter {
  /** Minimum input length (code points) */
  readonly minLength?: number

  /** Maximum input length (code points) */
  readonly maxLength?: number

  /** If the pattern starts with literals, a full match must start with them */
  readonly requiredPrefix?: string
}

/**
 * A matched region of the input, in UTF-16 code unit offsets.
 * @public
 */
export interface MatchSpan {
  readonly start: number
  readonly end: number
  readonly text: string
}

// =============================================================================
// THOMPSON NFA
// =============================================================================

/**
 * A nondeterministic finite automaton over code points.
 *
 * States live in an append-only arena and refer to each other by index
 * only. The automaton has exactly one accepting state.
 *
 * @public
 */
export interface RegexAutomaton {
  /** All states, indexed by id */
  readonly states: readonly AutomatonState[]

  /** Index of the initial state */
  readonly start: number

  /** Index of the single accepting state */
  readonly accept: number

  /** Flags that affect predicate and anchor evaluation */
  readonly flags: RegexFlags
}

/**
 * A state in the automaton.
 * @public
 */
export interface AutomatonState {
  /** Index in the states array */
  readonly id: number

  /** Outgoing transitions */
  readonly transitions: readonly AutomatonTransition[]

  readonly accepting: boolean
}

/**
 * A transition in the automaton.
 * @public
 */
export type AutomatonTransition = SymbolTransition | EpsilonTransition | AssertTransition

/**
 * Transition consuming one symbol that satisfies the predicate.
 * @public
 */
export interface SymbolTransition {
  readonly type: 'symbol'
  readonly predicate: SymbolPredicate
  readonly target: number
}

/**
 * Epsilon transition (no input consumed).
 * @public
 */
export interface EpsilonTransition {
  readonly type: 'epsilon'
  readonly target: number
}

/**
 * Zero-width transition taken only where the anchor holds.
 * @public
 */
export interface AssertTransition {
  readonly type: 'assert'
  readonly anchor: 'start' | 'end'
  readonly target: number
}

/**
 * What a symbol transition accepts.
 *
 * Any-char and classes are their own kinds; no symbol value is reserved.
 *
 * @public
 */
export type SymbolPredicate =
  | { readonly type: 'char'; readonly codePoint: number }
  | { readonly type: 'any' }
  | {
      readonly type: 'class'
      /** Sorted, non-overlapping, non-adjacent */
      readonly ranges: readonly CharRange[]
      readonly negated: boolean
    }

/**
 * Size summary of an automaton.
 * @public
 */
export interface AutomatonStats {
  readonly states: number
  readonly symbolTransitions: number
  readonly epsilonTransitions: number
  readonly assertTransitions: number
}
