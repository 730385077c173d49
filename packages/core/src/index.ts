/**
 * Regex Automata Library
 *
 * A regular-expression engine that compiles patterns to Thompson NFAs and
 * matches them by multi-state simulation, in time linear in the input and
 * without backtracking.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
  ParsedRegex,
  RegexNode,
  LiteralNode,
  AnyCharNode,
  CharClassNode,
  CharRange,
  ConcatNode,
  AlternateNode,
  StarNode,
  PlusNode,
  OptionalNode,
  AnchorStartNode,
  AnchorEndNode,
  EmptyNode,
  // Automaton types
  CompiledRegex,
  QuickRejectFilter,
  MatchSpan,
  RegexAutomaton,
  AutomatonState,
  AutomatonTransition,
  SymbolTransition,
  EpsilonTransition,
  AssertTransition,
  SymbolPredicate,
  AutomatonStats,
  // Option types
  RegexFlags,
  MatchLimits,
  RegexLogger,
  CompileOptions,
  // Error types
  RegexErrorCode,
  SyntaxErrorCode,
} from './types'
export { RegexSyntaxError, MatchLimitError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parseRegex, parseRegexOrThrow, MAX_NESTING_DEPTH } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compile, compileOrThrow, compilePattern } from './compile'
export { buildAutomaton, getMinLength, getMaxLength, isUnbounded } from './compile'
export { buildQuickRejectFilter, applyQuickReject } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { matches, matchesWithFilter, epsilonClosure } from './match'
export { find, findAll, test } from './match'
export { resolveLimits } from './limits'

// =============================================================================
// Automaton Analyses
// =============================================================================

export { isEmpty, findWitness, getAutomatonStats } from './automaton'
