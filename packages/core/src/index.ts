/**
 * SQL LIKE Pattern Engine
 *
 * Parses LIKE patterns (`%`, `_`, backslash escapes), matches byte strings
 * against them without a regex engine, extracts fixed prefixes for scan
 * pruning, and translates patterns to regex for a linear-time fallback.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Pattern types
  LikeInput,
  LikeToken,
  LiteralToken,
  PercentToken,
  UnderscoreToken,
  TrailingEscapeToken,
  LikeSegment,
  LikePattern,
  // Matcher types
  CompiledLikePattern,
  MatchStrategy,
  LikeMatcherOptions,
  CandidateMatcher,
  FieldValue,
  FieldKind,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { InvalidPatternError, PatternTypeError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { scanLikePattern, parseLikePattern, isExactPattern } from './parse'
export { validateLikePattern, isValidLikePattern } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compileLikePattern, extractFixedPrefix } from './compile'
export { translateLikeToRegex, translatePatternValue, isRegexSpecial } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { matchLikePattern, segmentMatchesAt, findSegment } from './match'
export { Re2RegexMatcher, BacktrackingRegexMatcher } from './match'
export { LikeMatcher, createLikeMatcher, matchFieldValue, DEFAULT_MATCH_STRATEGY } from './match'
export { isStringLike, toFieldValue, toBytes, toByteString, type StringLikeValue } from './match'
