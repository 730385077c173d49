/**
 * Read-only analyses over built automata.
 * @packageDocumentation
 */

export { isEmpty, findWitness } from './emptiness'
export { getAutomatonStats } from './stats'
