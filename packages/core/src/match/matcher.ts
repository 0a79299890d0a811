/**
 * LIKE matcher - selects a backend once and gates matching by value kind.
 * @packageDocumentation
 */

import type {
  CandidateMatcher,
  CompiledLikePattern,
  FieldValue,
  LikeInput,
  LikeMatcherOptions,
  MatchStrategy,
} from '../types'
import { compileLikePattern } from '../compile/compiler'
import { translateLikeToRegex } from '../compile/translator'
import { matchLikePattern } from './segment-matcher'
import { Re2RegexMatcher, BacktrackingRegexMatcher } from './regex-matcher'

/**
 * Backend used when no strategy is given. The regex backends are for
 * cross-checking and benchmarks.
 *
 * @public
 */
export const DEFAULT_MATCH_STRATEGY: MatchStrategy = 'segment'

/**
 * Apply a matcher to a row value.
 *
 * LIKE has no meaning over non-string data, so every other kind yields
 * `false`. This never throws.
 *
 * @param matcher - Any backend
 * @param value - Tagged row value
 * @returns true if the value is string-like and matches
 *
 * @public
 */
export function matchFieldValue(matcher: CandidateMatcher, value: FieldValue): boolean {
  switch (value.kind) {
    case 'string':
    case 'bytes':
      return matcher.matches(value.value)
    case 'bool':
    case 'int':
    case 'int64':
    case 'float':
    case 'json':
    case 'array':
    case 'null':
      return false
  }
}

function createBackend(compiled: CompiledLikePattern, strategy: MatchStrategy): CandidateMatcher {
  switch (strategy) {
    case 'segment':
      return { matches: (candidate) => matchLikePattern(compiled.pattern, candidate) }
    case 're2':
      return new Re2RegexMatcher(translateLikeToRegex(compiled.source))
    case 'backtracking':
      return new BacktrackingRegexMatcher(translateLikeToRegex(compiled.source))
  }
}

/**
 * A compiled LIKE predicate.
 *
 * Build one per distinct pattern and reuse it for every row: parsing (and
 * regex compilation, for the regex backends) happens once, in the
 * constructor. Instances hold no mutable state and can be shared freely.
 *
 * @public
 */
export class LikeMatcher implements CandidateMatcher {
  /** Backend evaluating the pattern */
  readonly strategy: MatchStrategy

  /** Parsed pattern and scan hint */
  readonly compiled: CompiledLikePattern

  private readonly backend: CandidateMatcher

  /**
   * @param source - Raw LIKE pattern
   * @param options - Backend selection
   * @throws InvalidPatternError if the pattern ends in a lone backslash
   */
  constructor(source: LikeInput, options: LikeMatcherOptions = {}) {
    this.strategy = options.strategy ?? DEFAULT_MATCH_STRATEGY
    this.compiled = compileLikePattern(source)
    this.backend = createBackend(this.compiled, this.strategy)
  }

  /** Original pattern */
  get source(): LikeInput {
    return this.compiled.source
  }

  /**
   * Test a candidate.
   *
   * @param candidate - String (UTF-8 encoded first) or bytes
   * @returns true if the whole candidate matches
   */
  matches(candidate: LikeInput): boolean {
    return this.backend.matches(candidate)
  }

  /**
   * Test a row value; non-string kinds yield `false`.
   */
  test(value: FieldValue): boolean {
    return matchFieldValue(this.backend, value)
  }
}

/**
 * Build a LIKE matcher.
 *
 * @param source - Raw LIKE pattern
 * @param options - Backend selection
 * @returns Matcher ready for per-row evaluation
 * @throws InvalidPatternError if the pattern ends in a lone backslash
 *
 * @public
 */
export function createLikeMatcher(source: LikeInput, options: LikeMatcherOptions = {}): LikeMatcher {
  return new LikeMatcher(source, options)
}
