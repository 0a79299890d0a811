/**
 * LIKE matching utilities.
 * @packageDocumentation
 */

export { toBytes, toByteString } from './byte-utils'

export { matchLikePattern, segmentMatchesAt, findSegment } from './segment-matcher'

export { Re2RegexMatcher, BacktrackingRegexMatcher } from './regex-matcher'

export { isStringLike, toFieldValue, type StringLikeValue } from './field-value'

export { LikeMatcher, createLikeMatcher, matchFieldValue, DEFAULT_MATCH_STRATEGY } from './matcher'
