/**
 * Input matching utilities.
 * @packageDocumentation
 */

export { matches, matchesWithFilter, epsilonClosure, closeThreads } from './matcher'
export { find, findAll, test } from './search'
export { symbolVariants, evaluatePredicate, anchorHolds } from './predicates'
