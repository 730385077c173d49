/**
 * Quick-reject filter construction.
 * @packageDocumentation
 */

import type { ParsedRegex, RegexNode, QuickRejectFilter } from '../types'
import { flattenChain, getMinLength, getMaxLength } from './automaton-builder'

/**
 * Build quick-reject filters for a pattern.
 *
 * Quick-reject filters enable fast elimination of inputs that cannot match
 * the whole pattern, before full automaton simulation.
 *
 * @param pattern - Parsed regex
 * @returns Quick-reject filter configuration
 *
 * @public
 */
export function buildQuickRejectFilter(pattern: ParsedRegex): QuickRejectFilter {
  const minLength = getMinLength(pattern)
  const maxLength = getMaxLength(pattern)

  // Case folding makes a literal prefix ambiguous
  const requiredPrefix = pattern.flags.caseInsensitive ? undefined : extractPrefix(pattern.root)

  return {
    minLength: minLength > 0 ? minLength : undefined,
    maxLength,
    requiredPrefix,
  }
}

/**
 * Leading literals every full match starts with.
 */
function extractPrefix(root: RegexNode): string | undefined {
  const operands = root.type === 'concat' ? flattenChain(root, 'concat') : [root]

  let prefix = ''
  for (const [index, operand] of operands.entries()) {
    if (operand.type === 'literal') {
      prefix += String.fromCodePoint(operand.codePoint)
    } else if (operand.type === 'anchor-start' && index === 0) {
      // A full match begins at offset 0, where ^ always holds
      continue
    } else {
      break
    }
  }

  return prefix !== '' ? prefix : undefined
}

/**
 * Count code points in a string.
 *
 * @public
 */
export function codePointLength(input: string): number {
  let count = 0
  for (let i = 0; i < input.length; i++) {
    const unit = input.charCodeAt(i)
    // Skip the low half of a surrogate pair
    if (unit >= 0xd800 && unit <= 0xdbff && i + 1 < input.length) {
      const next = input.charCodeAt(i + 1)
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++
      }
    }
    count++
  }
  return count
}

/**
 * Apply quick-reject filter to an input.
 *
 * @param input - Input to check
 * @param filter - Quick-reject filter
 * @returns false if the input definitely doesn't match in full, true if it might
 *
 * @public
 */
export function applyQuickReject(input: string, filter: QuickRejectFilter): boolean {
  // Code points never exceed code units
  if (filter.minLength !== undefined && input.length < filter.minLength) {
    return false
  }

  // Check required prefix
  if (filter.requiredPrefix !== undefined && !input.startsWith(filter.requiredPrefix)) {
    return false
  }

  // Check maximum length
  if (filter.maxLength !== undefined && codePointLength(input) > filter.maxLength) {
    return false
  }

  return true
}
