/**
 * LIKE to regex translation.
 * @packageDocumentation
 */

import type { FieldValue, LikeInput } from '../types'
import { InvalidPatternError, PatternTypeError } from '../types'
import { scanLikePattern, trailingEscapeError } from '../parse/scanner'

/** Any single byte, line separators included */
const ANY_BYTE = '[\\s\\S]'

/** Zero or more bytes, line separators included */
const ANY_BYTES = '[\\s\\S]*'

const REGEX_SPECIAL = new Set(Array.from('\\.+*?()|[]{}^$', (char) => char.charCodeAt(0)))

/**
 * Check whether a byte has special meaning in regex syntax.
 *
 * @param byte - Byte value (0-255)
 * @returns true for `\ . + * ? ( ) | [ ] { } ^ $`
 *
 * @public
 */
export function isRegexSpecial(byte: number): boolean {
  return REGEX_SPECIAL.has(byte)
}

/**
 * Translate a LIKE pattern into regex text with the same full-match result.
 *
 * - `%` becomes `[\s\S]*`
 * - `_` becomes `[\s\S]`
 * - regex metacharacters are escaped so they match literally
 * - `\%`, `\_` and `\\` decode to `%`, `_` and `\`
 *
 * The output is a byte string: every character code is one pattern byte
 * (0-255), so non-ASCII patterns translate byte by byte. Match it against
 * candidates in the same form (see `toByteString`).
 *
 * @param source - The raw LIKE pattern
 * @returns Regex text for full matching
 * @throws InvalidPatternError if the pattern ends in a lone backslash
 *
 * @public
 */
export function translateLikeToRegex(source: LikeInput): string {
  let regex = ''

  for (const token of scanLikePattern(source)) {
    switch (token.type) {
      case 'percent':
        regex += ANY_BYTES
        break
      case 'underscore':
        regex += ANY_BYTE
        break
      case 'literal':
        if (isRegexSpecial(token.byte)) {
          regex += '\\'
        }
        regex += String.fromCharCode(token.byte)
        break
      case 'trailing-escape':
        throw InvalidPatternError.from(trailingEscapeError(token.position))
    }
  }

  return regex
}

/**
 * Translate a pattern operand handed over by the expression evaluator.
 *
 * @param value - Pattern operand
 * @returns Regex text, as {@link translateLikeToRegex}
 * @throws PatternTypeError if the operand is not string-like
 *
 * @public
 */
export function translatePatternValue(value: FieldValue): string {
  switch (value.kind) {
    case 'string':
    case 'bytes':
      return translateLikeToRegex(value.value)
    default:
      throw new PatternTypeError(value.kind)
  }
}
