// =============================================================================
// LIKE PATTERN INPUT
// =============================================================================

/**
 * Anything the engine accepts as a pattern or candidate.
 *
 * Strings are UTF-8 encoded before any byte-level work. Byte arrays are
 * used as borrowed views and never copied.
 *
 * @public
 */
export type LikeInput = string | Uint8Array

// =============================================================================
// SCANNER TOKENS
// =============================================================================

/**
 * A single unit produced by scanning a raw LIKE pattern.
 * @public
 */
export type LikeToken = LiteralToken | PercentToken | UnderscoreToken | TrailingEscapeToken

/**
 * One literal byte.
 *
 * @example "a\\%" yields Literal('a'), Literal('%', escaped)
 *
 * @public
 */
export interface LiteralToken {
  readonly type: 'literal'

  /** The byte value (0-255) */
  readonly byte: number

  /** Whether the byte was preceded by a backslash */
  readonly escaped: boolean

  /** Byte offset of the token in the pattern (the backslash, when escaped) */
  readonly position: number
}

/**
 * Unescaped `%`: zero or more bytes.
 * @public
 */
export interface PercentToken {
  readonly type: 'percent'
  readonly position: number
}

/**
 * Unescaped `_`: exactly one byte.
 * @public
 */
export interface UnderscoreToken {
  readonly type: 'underscore'
  readonly position: number
}

/**
 * A backslash at the very end of the pattern, with nothing to escape.
 * Always the last token when present.
 * @public
 */
export interface TrailingEscapeToken {
  readonly type: 'trailing-escape'
  readonly position: number
}

// =============================================================================
// PARSED PATTERN
// =============================================================================

/**
 * The text between two consecutive `%` wildcards (or before the first / after
 * the last one).
 *
 * @example
 * "a_c" becomes:
 *   literal: "ac", underscores: [1], totalLength: 3
 *
 * @public
 */
export interface LikeSegment {
  /** Literal bytes with the `_` positions removed */
  readonly literal: Uint8Array

  /** Strictly increasing offsets of `_` within the segment */
  readonly underscores: readonly number[]

  /** Literal byte count plus underscore count */
  readonly totalLength: number
}

/**
 * A parsed LIKE pattern. Immutable once built.
 *
 * @example
 * "ab%c_d%" becomes:
 *   segments: [Segment("ab"), Segment("c_d"), Segment("")]
 *   leadingWildcard: false, trailingWildcard: true, minRequiredLength: 5
 *
 * @public
 */
export interface LikePattern {
  /** Original pattern, for error messages and debugging */
  readonly source: LikeInput

  /** Segments in pattern order; never empty */
  readonly segments: readonly LikeSegment[]

  /** Pattern starts with an unescaped `%` */
  readonly leadingWildcard: boolean

  /** Pattern ends with an unescaped `%` */
  readonly trailingWildcard: boolean

  /** Sum of all segment lengths; shorter candidates never match */
  readonly minRequiredLength: number
}
