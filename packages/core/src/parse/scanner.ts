/**
 * LIKE pattern scanner - splits raw pattern bytes into tokens.
 * @packageDocumentation
 */

import type { LikeInput, LikeToken, PatternError } from '../types'
import { toBytes } from '../match/byte-utils'

const BACKSLASH = 0x5c
const PERCENT = 0x25
const UNDERSCORE = 0x5f

/**
 * Scan a LIKE pattern into tokens, left to right.
 *
 * Tokens are produced lazily, so a consumer that stops early (the prefix
 * extractor stops at the first wildcard) never looks at the rest of the
 * pattern. A lone trailing backslash is reported as a final
 * `trailing-escape` token rather than thrown; each consumer decides how to
 * surface it.
 *
 * @param source - Raw pattern
 * @returns Iterator over the pattern's tokens
 *
 * @public
 */
export function* scanLikePattern(source: LikeInput): Generator<LikeToken, void, undefined> {
  const bytes = toBytes(source)

  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i]

    if (byte === BACKSLASH) {
      if (i + 1 >= bytes.length) {
        yield { type: 'trailing-escape', position: i }
        return
      }
      // Whatever follows a backslash is literal, even another backslash
      yield { type: 'literal', byte: bytes[i + 1], escaped: true, position: i }
      i++
    } else if (byte === PERCENT) {
      yield { type: 'percent', position: i }
    } else if (byte === UNDERSCORE) {
      yield { type: 'underscore', position: i }
    } else {
      yield { type: 'literal', byte, escaped: false, position: i }
    }
  }
}

/**
 * Describe a trailing backslash as a validation error.
 */
export function trailingEscapeError(position: number): PatternError {
  return {
    code: 'TRAILING_ESCAPE',
    message: 'Invalid LIKE pattern: trailing backslash with nothing to escape',
    position,
    length: 1,
  }
}
