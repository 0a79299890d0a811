/**
 * Regex backends - full-match adapters over translated LIKE patterns.
 * @packageDocumentation
 */

import { RE2JS } from 're2js'

import type { CandidateMatcher, LikeInput } from '../types'
import { InvalidPatternError } from '../types'
import { toByteString } from './byte-utils'

function invalidRegex(source: string, e: unknown): InvalidPatternError {
  const reason = e instanceof Error ? e.message : String(e)
  return new InvalidPatternError('INVALID_REGEX', `Failed to compile regex pattern "${source}": ${reason}`)
}

/**
 * Full-match regex backend on a linear-time engine (RE2).
 *
 * Used as the fallback backend and as the reference the byte-segment matcher
 * is checked against. RE2 has no backtracking, so chained `[\s\S]*` runs
 * cannot blow up on long candidates.
 *
 * Candidates are matched in byte-string form (see `toByteString`), the form
 * `translateLikeToRegex` produces.
 *
 * @public
 */
export class Re2RegexMatcher implements CandidateMatcher {
  private readonly compiled: RE2JS

  /**
   * @param source - Regex text, usually from `translateLikeToRegex`
   * @throws InvalidPatternError if the engine rejects the text
   */
  constructor(readonly source: string) {
    try {
      // `.` matches line separators too, like `[\s\S]`
      this.compiled = RE2JS.compile(source, RE2JS.DOTALL)
    } catch (e) {
      throw invalidRegex(source, e)
    }
  }

  matches(candidate: LikeInput): boolean {
    return this.compiled.matcher(toByteString(candidate)).matches()
  }
}

/**
 * Full-match regex backend on the host backtracking RegExp engine.
 *
 * Kept for benchmark comparison with {@link Re2RegexMatcher}. Chained
 * wildcards can make it take time exponential in the pattern size, so it
 * must never evaluate untrusted patterns on a query path.
 *
 * @public
 */
export class BacktrackingRegexMatcher implements CandidateMatcher {
  private readonly compiled: RegExp

  /**
   * @param source - Regex text, usually from `translateLikeToRegex`
   * @throws InvalidPatternError if the engine rejects the text
   */
  constructor(readonly source: string) {
    try {
      this.compiled = new RegExp(`^(?:${source})$`, 's')
    } catch (e) {
      throw invalidRegex(source, e)
    }
  }

  matches(candidate: LikeInput): boolean {
    return this.compiled.test(toByteString(candidate))
  }
}
