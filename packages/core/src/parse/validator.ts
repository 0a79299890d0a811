/**
 * Pattern validation - reports malformed escapes without throwing.
 * @packageDocumentation
 */

import type { LikeInput, PatternError } from '../types'
import { scanLikePattern, trailingEscapeError } from './scanner'

/**
 * Validate a LIKE pattern.
 *
 * Returns errors for:
 * - A trailing backslash with nothing to escape
 *
 * @param source - The raw pattern
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validateLikePattern(source: LikeInput): readonly PatternError[] {
  const errors: PatternError[] = []

  for (const token of scanLikePattern(source)) {
    if (token.type === 'trailing-escape') {
      errors.push(trailingEscapeError(token.position))
    }
  }

  return errors
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param source - The raw pattern
 * @returns true if the pattern compiles
 *
 * @public
 */
export function isValidLikePattern(source: LikeInput): boolean {
  return validateLikePattern(source).length === 0
}
