/**
 * Substring search - leftmost-longest matching without backtracking.
 * @packageDocumentation
 */

import type { RegexAutomaton, MatchLimits, MatchSpan } from '../types'
import { symbolAt, symbolWidth } from '../parse/char-classes'
import { resolveLimits, beginMatch, countStep, type StepCounter } from '../limits'
import { symbolVariants, evaluatePredicate } from './predicates'
import { closeThreads } from './matcher'

/**
 * Find the leftmost-longest match at or after `from`.
 *
 * Each active state carries the offset where its thread started. A new
 * thread is seeded at every position until a match is found; when two
 * threads reach the same state the earlier start wins. Among matches with
 * the leftmost start the longest one is returned.
 *
 * @param automaton - Automaton from `buildAutomaton`
 * @param input - String to search
 * @param from - Code unit offset to start searching at. Like `indexOf`, a
 * fractional offset is truncated and a negative or NaN one counts as 0
 * @param limits - Optional ceilings for this call
 * @returns The match, or null if there is none
 *
 * @public
 */
export function find(automaton: RegexAutomaton, input: string, from = 0, limits?: MatchLimits): MatchSpan | null {
  const counter = beginMatch(input, resolveLimits(limits))
  return findFrom(automaton, input, normalizeOffset(from), counter)
}

/**
 * Find all non-overlapping leftmost-longest matches, scanning left to right.
 *
 * After an empty match the scan resumes one code point further on.
 *
 * @public
 */
export function findAll(automaton: RegexAutomaton, input: string, limits?: MatchLimits): MatchSpan[] {
  const counter = beginMatch(input, resolveLimits(limits))
  const spans: MatchSpan[] = []

  let from = 0
  while (from <= input.length) {
    const span = findFrom(automaton, input, from, counter)
    if (span === null) {
      break
    }
    spans.push(span)

    if (span.end > span.start) {
      from = span.end
    } else if (span.end < input.length) {
      from = span.end + symbolWidth(symbolAt(input, span.end))
    } else {
      break
    }
  }

  return spans
}

/**
 * Test if any substring of the input matches.
 *
 * @public
 */
export function test(automaton: RegexAutomaton, input: string, limits?: MatchLimits): boolean {
  return find(automaton, input, 0, limits) !== null
}

function normalizeOffset(from: number): number {
  return Number.isNaN(from) ? 0 : Math.max(0, Math.trunc(from))
}

function findFrom(automaton: RegexAutomaton, input: string, from: number, counter: StepCounter): MatchSpan | null {
  if (from > input.length) {
    return null
  }

  let best: { start: number; end: number } | null = null
  // state -> start offset, in ascending start order
  let threads = new Map<number, number>()
  let position = from

  for (;;) {
    const seeds: [number, number][] = [...threads]
    if (best === null) {
      seeds.push([automaton.start, position])
    }
    threads = closeThreads(automaton, seeds, input, position)

    const acceptStart = threads.get(automaton.accept)
    if (acceptStart !== undefined && (best === null || acceptStart <= best.start)) {
      best = { start: acceptStart, end: position }
    }

    if (best !== null) {
      // Threads that started later can no longer win
      for (const [stateId, start] of threads) {
        if (start > best.start) {
          threads.delete(stateId)
        }
      }
      if (threads.size === 0) {
        break
      }
    }

    if (position >= input.length) {
      break
    }

    const codePoint = symbolAt(input, position)
    const variants = symbolVariants(codePoint, automaton.flags)
    const next = new Map<number, number>()

    for (const [stateId, start] of threads) {
      for (const transition of automaton.states[stateId].transitions) {
        if (transition.type !== 'symbol') continue
        countStep(counter)
        if (!next.has(transition.target) && evaluatePredicate(transition.predicate, variants)) {
          next.set(transition.target, start)
        }
      }
    }

    threads = next
    position += symbolWidth(codePoint)
  }

  if (best === null) {
    return null
  }
  return { start: best.start, end: best.end, text: input.slice(best.start, best.end) }
}
