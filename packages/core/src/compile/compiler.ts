/**
 * Regex compiler - parses, builds and packages a pattern for matching.
 * @packageDocumentation
 */

import type { Result } from 'neverthrow'

import type { ParsedRegex, CompiledRegex, CompileOptions, MatchLimits, RegexSyntaxError } from '../types'
import { parseRegex } from '../parse'
import { matchesWithFilter, find, findAll, test } from '../match'
import { getAutomatonStats } from '../automaton/stats'
import { resolveLimits } from '../limits'
import { buildAutomaton, getMinLength, getMaxLength } from './automaton-builder'
import { buildQuickRejectFilter } from './quick-reject'

/**
 * Compile a parsed pattern to its matching form.
 *
 * The compiled pattern includes:
 * - Original source and AST for debugging/analysis
 * - The Thompson NFA shared by every match call
 * - Quick-reject filters for fast full-match elimination
 * - Length bounds
 *
 * @param pattern - Parsed regex
 * @param limits - Ceilings applied to every match call on the result
 * @returns Frozen compiled regex
 *
 * @public
 */
export function compilePattern(pattern: ParsedRegex, limits?: MatchLimits): CompiledRegex {
  const automaton = buildAutomaton(pattern)
  const quickReject = buildQuickRejectFilter(pattern)
  const resolvedLimits = resolveLimits(limits)

  return Object.freeze({
    source: pattern.source,
    flags: pattern.flags,
    ast: pattern,
    automaton,
    quickReject,
    limits: resolvedLimits,
    minLength: getMinLength(pattern),
    maxLength: getMaxLength(pattern),
    stateCount: automaton.states.length,
    matches: (input: string) => matchesWithFilter(automaton, input, quickReject, resolvedLimits),
    find: (input: string, from = 0) => find(automaton, input, from, resolvedLimits),
    findAll: (input: string) => findAll(automaton, input, resolvedLimits),
    test: (input: string) => test(automaton, input, resolvedLimits),
  })
}

/**
 * Compile a pattern from source string.
 *
 * @example
 * ```ts
 * const result = compile('^[a-z]+$', { flags: { caseInsensitive: true } })
 * if (result.isOk()) {
 *   result.value.matches('Hello') // true
 * }
 * ```
 *
 * @param source - Pattern source string
 * @param options - Flags, match limits and an optional logger
 * @returns The compiled regex, or the syntax error that stopped parsing
 *
 * @public
 */
export function compile(source: string, options: CompileOptions = {}): Result<CompiledRegex, RegexSyntaxError> {
  const { flags = {}, limits, logger } = options

  return parseRegex(source, flags)
    .map((parsed) => {
      const compiled = compilePattern(parsed, limits)
      logger?.debug('compiled', { source, ...getAutomatonStats(compiled.automaton) })
      return compiled
    })
    .mapErr((error) => {
      logger?.info('syntax error', { source, code: error.code, position: error.position })
      return error
    })
}

/**
 * Compile a pattern, throwing on invalid syntax.
 *
 * @throws RegexSyntaxError if the pattern is malformed
 *
 * @public
 */
export function compileOrThrow(source: string, options: CompileOptions = {}): CompiledRegex {
  const result = compile(source, options)
  if (result.isErr()) {
    throw result.error
  }
  return result.value
}
