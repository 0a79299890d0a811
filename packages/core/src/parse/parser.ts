/**
 * Pattern parser - converts LIKE pattern bytes to segments.
 * @packageDocumentation
 */

import { Buffer } from 'node:buffer'

import type { LikeInput, LikePattern, LikeSegment } from '../types'
import { InvalidPatternError } from '../types'
import { scanLikePattern, trailingEscapeError } from './scanner'

/**
 * Accumulator for the segment currently being read.
 */
interface SegmentBuilder {
  literal: number[]
  underscores: number[]
  length: number
}

function newSegment(): SegmentBuilder {
  return { literal: [], underscores: [], length: 0 }
}

function finishSegment(builder: SegmentBuilder): LikeSegment {
  return Object.freeze({
    literal: Buffer.from(builder.literal),
    underscores: Object.freeze(builder.underscores),
    totalLength: builder.length,
  })
}

/**
 * Parse a LIKE pattern into segments.
 *
 * Every unescaped `%` closes the current segment, so a pattern with `n`
 * wildcards always yields `n + 1` segments. Consecutive `%` leave empty
 * segments behind; they impose no constraint on matching.
 *
 * @param source - The raw pattern
 * @returns Immutable parsed pattern
 * @throws InvalidPatternError if the pattern ends in a lone backslash
 *
 * @public
 */
export function parseLikePattern(source: LikeInput): LikePattern {
  const segments: LikeSegment[] = []
  let current = newSegment()
  let leadingWildcard = false
  let trailingWildcard = false
  let first = true

  for (const token of scanLikePattern(source)) {
    switch (token.type) {
      case 'percent':
        segments.push(finishSegment(current))
        current = newSegment()
        if (first) {
          leadingWildcard = true
        }
        // Reset below if anything follows
        trailingWildcard = true
        break

      case 'underscore':
        current.underscores.push(current.length)
        current.length++
        trailingWildcard = false
        break

      case 'literal':
        current.literal.push(token.byte)
        current.length++
        trailingWildcard = false
        break

      case 'trailing-escape':
        throw InvalidPatternError.from(trailingEscapeError(token.position))
    }
    first = false
  }

  segments.push(finishSegment(current))

  let minRequiredLength = 0
  for (const segment of segments) {
    minRequiredLength += segment.totalLength
  }

  return Object.freeze({
    source,
    segments: Object.freeze(segments),
    leadingWildcard,
    trailingWildcard,
    minRequiredLength,
  })
}

/**
 * Whether the pattern contains no unescaped wildcard at all.
 *
 * @public
 */
export function isExactPattern(pattern: LikePattern): boolean {
  return pattern.segments.length === 1 && pattern.segments[0].underscores.length === 0
}
