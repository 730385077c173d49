/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compile, compileOrThrow, compilePattern } from './compiler'
export { buildAutomaton, flattenChain, getMinLength, getMaxLength, isUnbounded } from './automaton-builder'
export { buildQuickRejectFilter, applyQuickReject, codePointLength } from './quick-reject'
