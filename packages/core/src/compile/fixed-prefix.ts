/**
 * Fixed-prefix extraction for scan-range pruning.
 * @packageDocumentation
 */

import { Buffer } from 'node:buffer'

import type { LikeInput } from '../types'
import { InvalidPatternError } from '../types'
import { scanLikePattern, trailingEscapeError } from '../parse/scanner'

/**
 * Extract the literal bytes a pattern requires at the start of every match.
 *
 * Stops at the first unescaped `%` or `_`. Escaped `%`, `_` and `\`
 * contribute their literal byte. The result is only a hint for narrowing a
 * scan: every surviving value still has to go through full matching.
 *
 * @example "abc%def" returns "abc", "a\\%b%" returns "a%b", "_abc" returns ""
 *
 * @param source - The raw pattern
 * @returns Literal prefix bytes (empty when the pattern starts with a wildcard)
 * @throws InvalidPatternError if a lone trailing backslash is reached before
 * any wildcard
 *
 * @public
 */
export function extractFixedPrefix(source: LikeInput): Buffer {
  const prefix: number[] = []

  for (const token of scanLikePattern(source)) {
    if (token.type === 'literal') {
      prefix.push(token.byte)
      continue
    }
    if (token.type === 'trailing-escape') {
      throw InvalidPatternError.from(trailingEscapeError(token.position))
    }
    break
  }

  return Buffer.from(prefix)
}
