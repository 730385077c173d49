/**
 * Type definitions for the regex engine.
 * @packageDocumentation
 */

// AST types
export type {
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
} from './ast'

// Automaton types
export type {
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
} from './automaton'

// Option types
export type { RegexFlags, MatchLimits, RegexLogger, CompileOptions } from './options'

// Error types
export type { RegexErrorCode, SyntaxErrorCode } from './errors'
export { RegexSyntaxError, MatchLimitError } from './errors'
