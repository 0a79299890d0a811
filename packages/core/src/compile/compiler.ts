/**
 * Pattern compiler - parses a LIKE pattern and derives its scan hint.
 * @packageDocumentation
 */

import type { CompiledLikePattern, LikeInput } from '../types'
import { parseLikePattern, isExactPattern } from '../parse'
import { extractFixedPrefix } from './fixed-prefix'

/**
 * Compile a LIKE pattern.
 *
 * The compiled pattern includes:
 * - Original source for debugging
 * - Parsed segments for the byte-segment matcher
 * - The fixed prefix, for narrowing a scan before matching
 * - Whether the pattern is an exact value (no wildcards)
 *
 * @param source - Raw pattern
 * @returns Compiled pattern ready for matching
 * @throws InvalidPatternError if the pattern ends in a lone backslash
 *
 * @public
 */
export function compileLikePattern(source: LikeInput): CompiledLikePattern {
  const pattern = parseLikePattern(source)

  return Object.freeze({
    source,
    pattern,
    fixedPrefix: extractFixedPrefix(source),
    isExact: isExactPattern(pattern),
  })
}
