import type { RegexAutomaton, AutomatonStats } from '../types'

/**
 * Count the states and transitions of an automaton.
 *
 * @public
 */
export function getAutomatonStats(automaton: RegexAutomaton): AutomatonStats {
  let symbolTransitions = 0
  let epsilonTransitions = 0
  let assertTransitions = 0

  for (const state of automaton.states) {
    for (const transition of state.transitions) {
      switch (transition.type) {
        case 'symbol':
          symbolTransitions++
          break
        case 'epsilon':
          epsilonTransitions++
          break
        case 'assert':
          assertTransitions++
          break
      }
    }
  }

  return {
    states: automaton.states.length,
    symbolTransitions,
    epsilonTransitions,
    assertTransitions,
  }
}
