/**
 * Automaton builder - converts regex AST to a Thompson NFA.
 * @packageDocumentation
 */

import type {
  ParsedRegex,
  RegexNode,
  ConcatNode,
  AlternateNode,
  RegexAutomaton,
  AutomatonState,
  AutomatonTransition,
  SymbolPredicate,
} from '../types'
import { normalizeRanges, foldCase } from '../parse/char-classes'

/**
 * Mutable state used only while building.
 */
interface DraftState {
  readonly id: number
  accepting: boolean
  readonly transitions: AutomatonTransition[]
}

/**
 * Mutable state arena for constructing automata.
 */
interface AutomatonBuilder {
  readonly states: DraftState[]
  /** Literals are stored case-folded */
  readonly caseInsensitive: boolean
}

/**
 * A partially built automaton with one dangling entry and one dangling exit.
 */
interface Fragment {
  readonly entry: number
  readonly exit: number
}

/**
 * Build a Thompson NFA from a regex AST.
 *
 * Every AST node contributes a fragment with a constant number of new
 * states, so the automaton is linear in the size of the pattern. The exit of
 * the outermost fragment is the only accepting state.
 *
 * Total over any AST the parser produces.
 *
 * @param pattern - Parsed regex
 * @returns Frozen automaton
 *
 * @public
 */
export function buildAutomaton(pattern: ParsedRegex): RegexAutomaton {
  const builder: AutomatonBuilder = { states: [], caseInsensitive: pattern.flags.caseInsensitive === true }

  const fragment = buildFragment(builder, pattern.root)
  builder.states[fragment.exit].accepting = true

  const states: AutomatonState[] = builder.states.map((state) =>
    Object.freeze({
      id: state.id,
      accepting: state.accepting,
      transitions: Object.freeze([...state.transitions]),
    }),
  )

  return Object.freeze({
    states: Object.freeze(states),
    start: fragment.entry,
    accept: fragment.exit,
    flags: pattern.flags,
  })
}

/**
 * Create a new state in the arena.
 */
function createState(builder: AutomatonBuilder): number {
  const id = builder.states.length
  builder.states.push({ id, accepting: false, transitions: [] })
  return id
}

/**
 * Add a transition to a state. Duplicate epsilon edges are dropped.
 */
function addTransition(builder: AutomatonBuilder, fromState: number, transition: AutomatonTransition): void {
  const { transitions } = builder.states[fromState]
  if (
    transition.type === 'epsilon' &&
    transitions.some((existing) => existing.type === 'epsilon' && existing.target === transition.target)
  ) {
    return
  }
  transitions.push(transition)
}

function addEpsilon(builder: AutomatonBuilder, fromState: number, target: number): void {
  addTransition(builder, fromState, { type: 'epsilon', target })
}

/**
 * Fragment consuming one symbol that satisfies the predicate.
 */
function symbolFragment(builder: AutomatonBuilder, predicate: SymbolPredicate): Fragment {
  const entry = createState(builder)
  const exit = createState(builder)
  addTransition(builder, entry, { type: 'symbol', predicate, target: exit })
  return { entry, exit }
}

/**
 * Build the fragment for a node.
 */
function buildFragment(builder: AutomatonBuilder, node: RegexNode): Fragment {
  switch (node.type) {
    case 'literal':
      return symbolFragment(builder, {
        type: 'char',
        codePoint: builder.caseInsensitive ? foldCase(node.codePoint) : node.codePoint,
      })

    case 'any':
      return symbolFragment(builder, { type: 'any' })

    case 'charclass':
      return symbolFragment(builder, { type: 'class', ranges: normalizeRanges(node.ranges), negated: node.negated })

    case 'concat':
      return buildConcat(builder, flattenChain(node, 'concat'))

    case 'alternate':
      return buildAlternate(builder, flattenChain(node, 'alternate'))

    case 'star': {
      const entry = createState(builder)
      const exit = createState(builder)
      const inner = buildFragment(builder, node.inner)
      addEpsilon(builder, entry, inner.entry)
      addEpsilon(builder, entry, exit) // zero iterations
      addEpsilon(builder, inner.exit, entry) // repeat
      addEpsilon(builder, inner.exit, exit)
      return { entry, exit }
    }

    case 'plus': {
      // x x* without building x twice: loop back through x's own entry
      const inner = buildFragment(builder, node.inner)
      const exit = createState(builder)
      addEpsilon(builder, inner.exit, inner.entry)
      addEpsilon(builder, inner.exit, exit)
      return { entry: inner.entry, exit }
    }

    case 'optional': {
      const entry = createState(builder)
      const inner = buildFragment(builder, node.inner)
      const exit = createState(builder)
      addEpsilon(builder, entry, inner.entry)
      addEpsilon(builder, entry, exit)
      addEpsilon(builder, inner.exit, exit)
      return { entry, exit }
    }

    case 'anchor-start':
    case 'anchor-end': {
      const entry = createState(builder)
      const exit = createState(builder)
      addTransition(builder, entry, {
        type: 'assert',
        anchor: node.type === 'anchor-start' ? 'start' : 'end',
        target: exit,
      })
      return { entry, exit }
    }

    case 'empty': {
      const state = createState(builder)
      return { entry: state, exit: state }
    }
  }
}

/**
 * Chain fragments: each exit is wired to the next entry.
 */
function buildConcat(builder: AutomatonBuilder, operands: readonly RegexNode[]): Fragment {
  let entry: number | undefined
  let exit: number | undefined

  for (const operand of operands) {
    const fragment = buildFragment(builder, operand)
    if (exit === undefined) {
      entry = fragment.entry
    } else {
      addEpsilon(builder, exit, fragment.entry)
    }
    exit = fragment.exit
  }

  if (entry === undefined || exit === undefined) {
    const state = createState(builder)
    return { entry: state, exit: state }
  }
  return { entry, exit }
}

/**
 * One shared entry fanning out to every branch; every branch joins one shared exit.
 */
function buildAlternate(builder: AutomatonBuilder, branches: readonly RegexNode[]): Fragment {
  const entry = createState(builder)
  const fragments = branches.map((branch) => buildFragment(builder, branch))
  const exit = createState(builder)

  for (const fragment of fragments) {
    addEpsilon(builder, entry, fragment.entry)
    addEpsilon(builder, fragment.exit, exit)
  }

  return { entry, exit }
}

/**
 * Collect the operands of a left- or right-nested chain of one binary
 * operator, in order, without recursing down the spine.
 *
 * @public
 */
export function flattenChain(node: ConcatNode | AlternateNode, type: 'concat' | 'alternate'): RegexNode[] {
  const operands: RegexNode[] = []
  const stack: RegexNode[] = [node]

  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    if ((current.type === 'concat' || current.type === 'alternate') && current.type === type) {
      stack.push(current.right, current.left)
    } else {
      operands.push(current)
    }
  }

  return operands
}

/**
 * Get the minimum number of code points a pattern can match.
 *
 * @param pattern - Parsed regex
 * @returns Minimum length
 *
 * @public
 */
export function getMinLength(pattern: ParsedRegex): number {
  return getNodeMinLength(pattern.root)
}

function getNodeMinLength(node: RegexNode): number {
  switch (node.type) {
    case 'literal':
    case 'any':
    case 'charclass':
      return 1

    case 'concat':
      return flattenChain(node, 'concat').reduce((sum, operand) => sum + getNodeMinLength(operand), 0)

    case 'alternate':
      return flattenChain(node, 'alternate').reduce(
        (min, branch) => Math.min(min, getNodeMinLength(branch)),
        Number.POSITIVE_INFINITY,
      )

    case 'plus':
      return getNodeMinLength(node.inner)

    case 'star':
    case 'optional':
    case 'anchor-start':
    case 'anchor-end':
    case 'empty':
      return 0
  }
}

/**
 * Get the maximum number of code points a pattern can match.
 *
 * @param pattern - Parsed regex
 * @returns Maximum length, or undefined if unbounded (contains a repeat of a non-empty expression)
 *
 * @public
 */
export function getMaxLength(pattern: ParsedRegex): number | undefined {
  return getNodeMaxLength(pattern.root)
}

function getNodeMaxLength(node: RegexNode): number | undefined {
  switch (node.type) {
    case 'literal':
    case 'any':
    case 'charclass':
      return 1

    case 'concat': {
      let total = 0
      for (const operand of flattenChain(node, 'concat')) {
        const max = getNodeMaxLength(operand)
        if (max === undefined) {
          return undefined
        }
        total += max
      }
      return total
    }

    case 'alternate': {
      let longest = 0
      for (const branch of flattenChain(node, 'alternate')) {
        const max = getNodeMaxLength(branch)
        if (max === undefined) {
          return undefined
        }
        longest = Math.max(longest, max)
      }
      return longest
    }

    case 'star':
    case 'plus':
      // Repeating something that can only match "" still matches only ""
      return getNodeMaxLength(node.inner) === 0 ? 0 : undefined

    case 'optional':
      return getNodeMaxLength(node.inner)

    case 'anchor-start':
    case 'anchor-end':
    case 'empty':
      return 0
  }
}

/**
 * Check if a pattern can match inputs of any length.
 *
 * @param pattern - Parsed regex
 * @returns true if pattern is unbounded
 *
 * @public
 */
export function isUnbounded(pattern: ParsedRegex): boolean {
  return getMaxLength(pattern) === undefined
}
