/**
 * Error codes for LIKE pattern failures.
 * @public
 */
export type PatternErrorCode =
  | 'TRAILING_ESCAPE' // Lone backslash at end of pattern
  | 'INVALID_REGEX' // Regex text rejected by a regex backend
  | 'UNSUPPORTED_TYPE' // Pattern operand is not string-like

/**
 * A pattern validation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Byte offset in the pattern where the error starts */
  readonly position?: number

  /** Length of the problematic section, in bytes */
  readonly length?: number
}

/**
 * Error thrown when a pattern cannot be compiled.
 *
 * Raised while building a parser result, extracting a prefix, translating to
 * regex, or compiling regex text. Never raised by matching.
 *
 * @public
 */
export class InvalidPatternError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Byte offset of the offending input, when known */
  readonly position?: number

  constructor(code: PatternErrorCode, message: string, position?: number) {
    super(message)
    this.name = 'InvalidPatternError'
    this.code = code
    this.position = position
  }

  /**
   * Build the error from a validation record.
   */
  static from(error: PatternError): InvalidPatternError {
    return new InvalidPatternError(error.code, error.message, error.position)
  }
}

/**
 * Error thrown when a pattern operand is not a string-like value.
 *
 * @public
 */
export class PatternTypeError extends Error {
  readonly code: PatternErrorCode = 'UNSUPPORTED_TYPE'

  /** Kind of the rejected operand */
  readonly kind: string

  constructor(kind: string) {
    super(`Pattern matching is only supported on string values, got ${kind}`)
    this.name = 'PatternTypeError'
    this.kind = kind
  }
}
