/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compileLikePattern } from './compiler'
export { extractFixedPrefix } from './fixed-prefix'
export { translateLikeToRegex, translatePatternValue, isRegexSpecial } from './translator'
