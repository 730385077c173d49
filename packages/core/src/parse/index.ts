/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parseRegex, parseRegexOrThrow, MAX_NESTING_DEPTH } from './parser'
export {
  shorthandClass,
  normalizeRanges,
  rangesContain,
  symbolAt,
  symbolWidth,
  foldCase,
  caseForms,
  MAX_CODE_POINT,
} from './char-classes'
