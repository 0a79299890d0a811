/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { scanLikePattern } from './scanner'
export { parseLikePattern, isExactPattern } from './parser'
export { validateLikePattern, isValidLikePattern } from './validator'
