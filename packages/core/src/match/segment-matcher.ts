/**
 * Byte-segment matching - evaluates LIKE patterns without a regex engine.
 * @packageDocumentation
 */

import type { Buffer } from 'node:buffer'

import type { LikeInput, LikePattern, LikeSegment } from '../types'
import { toBytes } from './byte-utils'

/**
 * Check if a segment matches the candidate at a given offset.
 *
 * Underscore offsets accept any byte; every other offset must equal the next
 * literal byte.
 *
 * @param segment - Parsed segment
 * @param candidate - Candidate bytes
 * @param start - Offset in the candidate
 * @returns true if the segment fits at `start`
 *
 * @public
 */
export function segmentMatchesAt(segment: LikeSegment, candidate: Uint8Array, start: number): boolean {
  if (start < 0 || start + segment.totalLength > candidate.length) {
    return false
  }

  const { literal, underscores } = segment
  let literalIndex = 0
  let underscoreIndex = 0

  for (let i = 0; i < segment.totalLength; i++) {
    if (underscoreIndex < underscores.length && underscores[underscoreIndex] === i) {
      underscoreIndex++
      continue
    }
    if (candidate[start + i] !== literal[literalIndex]) {
      return false
    }
    literalIndex++
  }

  return true
}

/**
 * Find the first offset at or after `from` where a segment matches.
 *
 * @param segment - Parsed segment
 * @param candidate - Candidate bytes
 * @param from - First offset to try
 * @returns Matching offset, or -1
 *
 * @public
 */
export function findSegment(segment: LikeSegment, candidate: Buffer, from: number): number {
  if (segment.underscores.length === 0) {
    // Pure literal - plain substring search
    if (segment.totalLength === 0) {
      return from <= candidate.length ? from : -1
    }
    return candidate.indexOf(segment.literal, from)
  }

  for (let pos = from; pos + segment.totalLength <= candidate.length; pos++) {
    if (segmentMatchesAt(segment, candidate, pos)) {
      return pos
    }
  }
  return -1
}

/**
 * Test a candidate against a parsed LIKE pattern.
 *
 * Single pass with no backtracking: the first segment is pinned to the start
 * and the last one to the end (unless a `%` sits there), and each segment in
 * between is taken at its leftmost occurrence after the previous one. All
 * segments have a fixed length, so the leftmost occurrence always leaves the
 * most room for the rest and no other choice needs to be tried.
 *
 * @param pattern - Parsed pattern
 * @param input - Candidate value
 * @returns true if the whole candidate matches
 *
 * @public
 */
export function matchLikePattern(pattern: LikePattern, input: LikeInput): boolean {
  const candidate = toBytes(input)
  const { segments, leadingWildcard, trailingWildcard } = pattern

  if (candidate.length < pattern.minRequiredLength) {
    return false
  }

  // No % at all: exact length and position
  if (segments.length === 1 && !leadingWildcard && !trailingWildcard) {
    const only = segments[0]
    return candidate.length === only.totalLength && segmentMatchesAt(only, candidate, 0)
  }

  const last = segments.length - 1
  let pos = 0

  for (let i = 0; i <= last; i++) {
    const segment = segments[i]
    if (segment.totalLength === 0) {
      continue
    }

    if (i === 0 && !leadingWildcard) {
      if (!segmentMatchesAt(segment, candidate, 0)) {
        return false
      }
      pos = segment.totalLength
    } else if (i === last && !trailingWildcard) {
      const start = candidate.length - segment.totalLength
      return start >= pos && segmentMatchesAt(segment, candidate, start)
    } else {
      const found = findSegment(segment, candidate, pos)
      if (found === -1) {
        return false
      }
      pos = found + segment.totalLength
    }
  }

  return true
}
