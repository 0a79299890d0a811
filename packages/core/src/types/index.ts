/**
 * Type definitions for the LIKE pattern engine.
 * @packageDocumentation
 */

// Pattern types
export type {
  LikeInput,
  LikeToken,
  LiteralToken,
  PercentToken,
  UnderscoreToken,
  TrailingEscapeToken,
  LikeSegment,
  LikePattern,
} from './ast'

// Matcher types
export type {
  CompiledLikePattern,
  MatchStrategy,
  LikeMatcherOptions,
  CandidateMatcher,
  FieldValue,
  FieldKind,
} from './matcher'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { InvalidPatternError, PatternTypeError } from './errors'
