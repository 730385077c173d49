/**
 * Full-input matching - simulates the NFA against a string.
 * @packageDocumentation
 */

import type { RegexAutomaton, MatchLimits, QuickRejectFilter } from '../types'
import { applyQuickReject } from '../compile/quick-reject'
import { symbolAt } from '../parse/char-classes'
import { resolveLimits, beginMatch, countStep, type StepCounter } from '../limits'
import { symbolVariants, evaluatePredicate, anchorHolds } from './predicates'

/**
 * Test if the whole input is accepted by the automaton.
 *
 * Multi-state simulation: one active-state set per input position, so the
 * cost is O(states × input) whatever the pattern.
 *
 * @param automaton - Automaton from `buildAutomaton`
 * @param input - String to match, consumed one code point at a time
 * @param limits - Optional ceilings for this call
 * @returns true if the input matches in full
 * @throws MatchLimitError only when a limit is set and exceeded
 *
 * @public
 */
export function matches(automaton: RegexAutomaton, input: string, limits?: MatchLimits): boolean {
  const counter = beginMatch(input, resolveLimits(limits))
  return simulate(automaton, input, counter)
}

/**
 * Like `matches`, but first applies a quick-reject filter.
 *
 * @public
 */
export function matchesWithFilter(
  automaton: RegexAutomaton,
  input: string,
  filter: QuickRejectFilter,
  limits?: MatchLimits,
): boolean {
  const counter = beginMatch(input, resolveLimits(limits))
  if (!applyQuickReject(input, filter)) {
    return false
  }
  return simulate(automaton, input, counter)
}

/**
 * Run the simulation over the whole input.
 */
function simulate(automaton: RegexAutomaton, input: string, counter: StepCounter): boolean {
  let currentStates = epsilonClosure(automaton, [automaton.start], input, 0)
  let position = 0

  for (const char of input) {
    const variants = symbolVariants(symbolAt(char, 0), automaton.flags)
    const nextStates: number[] = []

    for (const stateId of currentStates) {
      for (const transition of automaton.states[stateId].transitions) {
        if (transition.type !== 'symbol') continue
        countStep(counter)
        if (evaluatePredicate(transition.predicate, variants)) {
          nextStates.push(transition.target)
        }
      }
    }

    position += char.length
    currentStates = epsilonClosure(automaton, nextStates, input, position)

    if (currentStates.size === 0) {
      return false // No path can revive without consuming input
    }
  }

  return currentStates.has(automaton.accept)
}

/**
 * Compute the epsilon closure of a set of states at an input position.
 *
 * Follows epsilon transitions unconditionally and assert transitions when
 * their anchor holds at `position`.
 *
 * @public
 */
export function epsilonClosure(
  automaton: RegexAutomaton,
  states: Iterable<number>,
  input: string,
  position: number,
): Set<number> {
  const seeds: [number, number][] = []
  for (const stateId of states) {
    seeds.push([stateId, 0])
  }
  return new Set(closeThreads(automaton, seeds, input, position).keys())
}

/**
 * Epsilon closure that carries a start offset with every state.
 *
 * Seeds are closed in order and a state keeps the start of the first seed
 * that reaches it, so seeds given in ascending start order give every state
 * its earliest start. The returned map iterates in that same order.
 *
 * @param seeds - [state, start offset] pairs
 *
 * @public
 */
export function closeThreads(
  automaton: RegexAutomaton,
  seeds: Iterable<readonly [number, number]>,
  input: string,
  position: number,
): Map<number, number> {
  const closure = new Map<number, number>()
  const worklist: number[] = []

  for (const [seed, start] of seeds) {
    if (closure.has(seed)) continue
    closure.set(seed, start)
    worklist.push(seed)

    for (let stateId = worklist.pop(); stateId !== undefined; stateId = worklist.pop()) {
      for (const transition of automaton.states[stateId].transitions) {
        if (transition.type === 'symbol') continue
        if (
          transition.type === 'assert' &&
          !anchorHolds(transition.anchor, input, position, automaton.flags)
        ) {
          continue
        }
        if (!closure.has(transition.target)) {
          closure.set(transition.target, start)
          worklist.push(transition.target)
        }
      }
    }
  }

  return closure
}
