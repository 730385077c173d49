/**
 * Automaton emptiness checking and witness finding.
 * @packageDocumentation
 */

import type { RegexAutomaton, RegexFlags, SymbolPredicate } from '../types'
import { MAX_CODE_POINT } from '../parse/char-classes'
import { symbolVariants, evaluatePredicate } from '../match/predicates'

const NEWLINE = 0x0a

/** Symbols tried first when a predicate needs a sample */
const PREFERRED_SAMPLES = [0x61, 0x41, 0x30, 0x20, 0x5f] // a A 0 space _

/** How many code points of one gap are tried for a negated class */
const GAP_PROBE_LIMIT = 64

/**
 * Where a search configuration stands relative to the anchors.
 * - free: may consume anything
 * - newline: a multiline `$` was taken, the next symbol must be `\n`
 * - ended: a `$` was taken at end of input, nothing more may be consumed
 */
type Phase = 'free' | 'newline' | 'ended'

interface SearchNode {
  readonly stateId: number
  /** `^` holds here */
  readonly lineStart: boolean
  readonly phase: Phase
  readonly text: string
}

/**
 * Check if an automaton's language is empty.
 *
 * Semantic check: predicates and anchors are taken into account, so `a^`
 * is empty even though its accepting state is reachable in the graph.
 *
 * @param automaton - The automaton to check
 * @returns true if the automaton accepts no strings
 *
 * @public
 */
export function isEmpty(automaton: RegexAutomaton): boolean {
  return findWitness(automaton) === undefined
}

/**
 * Find a shortest string accepted by the automaton.
 *
 * Breadth-first search one symbol at a time; within a layer, zero-width
 * transitions are followed before anything is consumed. Every symbol
 * transition contributes one sample symbol that satisfies its predicate.
 *
 * @param automaton - The automaton to find a witness for
 * @returns A witness string, or undefined if the language is empty
 *
 * @public
 */
export function findWitness(automaton: RegexAutomaton): string | undefined {
  const { flags } = automaton
  const multiline = flags.multiline === true
  const visited = new Set<string>()

  let layer: SearchNode[] = [{ stateId: automaton.start, lineStart: true, phase: 'free', text: '' }]

  while (layer.length > 0) {
    // Close the layer under zero-width transitions
    const closed: SearchNode[] = []
    const stack = [...layer]

    for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
      const key = `${node.stateId}|${node.lineStart ? 1 : 0}|${node.phase}`
      if (visited.has(key)) continue
      visited.add(key)
      closed.push(node)

      if (node.stateId === automaton.accept && node.phase !== 'newline') {
        return node.text
      }

      for (const transition of automaton.states[node.stateId].transitions) {
        if (transition.type === 'epsilon') {
          stack.push({ ...node, stateId: transition.target })
        } else if (transition.type === 'assert' && transition.anchor === 'start') {
          if (node.lineStart) {
            stack.push({ ...node, stateId: transition.target })
          }
        } else if (transition.type === 'assert') {
          // $ holds at end of input, or (multiline) before a newline
          if (node.phase !== 'newline') {
            stack.push({ ...node, stateId: transition.target, phase: 'ended' })
          }
          if (multiline && node.phase !== 'ended') {
            stack.push({ ...node, stateId: transition.target, phase: 'newline' })
          }
        }
      }
    }

    // Consume one symbol
    const next: SearchNode[] = []
    for (const node of closed) {
      if (node.phase === 'ended') continue

      for (const transition of automaton.states[node.stateId].transitions) {
        if (transition.type !== 'symbol') continue

        for (const sample of samplesFor(transition.predicate, flags, node.phase === 'newline', multiline)) {
          next.push({
            stateId: transition.target,
            lineStart: multiline && sample === NEWLINE,
            phase: 'free',
            text: node.text + String.fromCodePoint(sample),
          })
        }
      }
    }

    layer = next
  }

  return undefined // No accepting configuration found
}

/**
 * Sample symbols to try for one transition.
 */
function samplesFor(
  predicate: SymbolPredicate,
  flags: RegexFlags,
  newlineOnly: boolean,
  multiline: boolean,
): number[] {
  const acceptsNewline = evaluatePredicate(predicate, symbolVariants(NEWLINE, flags))
  if (newlineOnly) {
    return acceptsNewline ? [NEWLINE] : []
  }

  const samples: number[] = []
  const sample = sampleSymbol(predicate, flags)
  if (sample !== undefined) {
    samples.push(sample)
  }
  // A newline also makes a following multiline ^ hold
  if (multiline && acceptsNewline && sample !== NEWLINE) {
    samples.push(NEWLINE)
  }
  return samples
}

/**
 * Pick one symbol the predicate accepts, or undefined if none was found.
 */
function sampleSymbol(predicate: SymbolPredicate, flags: RegexFlags): number | undefined {
  const accepts = (codePoint: number) => evaluatePredicate(predicate, symbolVariants(codePoint, flags))

  switch (predicate.type) {
    case 'char':
      return predicate.codePoint

    case 'any':
      return PREFERRED_SAMPLES[0]

    case 'class': {
      const preferred = PREFERRED_SAMPLES.find(accepts)
      if (preferred !== undefined) {
        return preferred
      }
      if (!predicate.negated) {
        return predicate.ranges.length > 0 ? predicate.ranges[0].start : undefined
      }

      // Probe the gaps between the excluded ranges
      let gapStart = 0
      for (const range of [...predicate.ranges, { start: MAX_CODE_POINT + 1, end: MAX_CODE_POINT + 1 }]) {
        const gapEnd = Math.min(range.start - 1, gapStart + GAP_PROBE_LIMIT - 1)
        for (let codePoint = gapStart; codePoint <= gapEnd; codePoint++) {
          if (accepts(codePoint)) {
            return codePoint
          }
        }
        gapStart = Math.max(gapStart, range.end + 1)
      }
      return undefined
    }
  }
}
