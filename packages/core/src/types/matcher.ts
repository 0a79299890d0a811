import type { LikeInput, LikePattern } from './ast'

// =============================================================================
// COMPILED PATTERN
// =============================================================================

/**
 * A LIKE pattern compiled for matching and scan pruning.
 *
 * @public
 */
export interface CompiledLikePattern {
  /** Original source pattern */
  readonly source: LikeInput

  /** Parsed segments used by the byte-segment matcher */
  readonly pattern: LikePattern

  /**
   * Literal bytes preceding the first unescaped wildcard.
   * A scan may skip every value that does not start with them.
   */
  readonly fixedPrefix: Uint8Array

  /**
   * Pattern has no unescaped wildcard: `fixedPrefix` is the only value that
   * can match.
   */
  readonly isExact: boolean
}

// =============================================================================
// MATCHING BACKENDS
// =============================================================================

/**
 * Backend used to evaluate a LIKE pattern.
 *
 * - `segment`: byte-segment matcher, no regex engine (default)
 * - `re2`: linear-time regex engine over the translated pattern
 * - `backtracking`: host RegExp engine over the translated pattern, for
 *   benchmark comparison only
 *
 * @public
 */
export type MatchStrategy = 'segment' | 're2' | 'backtracking'

/**
 * Options for building a LIKE matcher.
 *
 * @public
 */
export interface LikeMatcherOptions {
  /**
   * Backend evaluating the pattern.
   * @defaultValue 'segment'
   */
  strategy?: MatchStrategy
}

/**
 * Full-match contract shared by every backend.
 *
 * @public
 */
export interface CandidateMatcher {
  /** Whether the whole candidate satisfies the pattern */
  matches(candidate: LikeInput): boolean
}

// =============================================================================
// ROW VALUES
// =============================================================================

/**
 * A row value as handed over by the expression evaluator, tagged by kind.
 * Only `string` and `bytes` are string-like.
 *
 * @public
 */
export type FieldValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'bytes'; readonly value: Uint8Array }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'int64'; readonly value: bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'json'; readonly value: unknown }
  | { readonly kind: 'array'; readonly value: readonly FieldValue[] }
  | { readonly kind: 'null' }

/**
 * Discriminant of {@link FieldValue}.
 * @public
 */
export type FieldKind = FieldValue['kind']
