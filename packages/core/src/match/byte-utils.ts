/**
 * Byte-level views over pattern and candidate input.
 * @packageDocumentation
 */

import { Buffer } from 'node:buffer'

import type { LikeInput } from '../types'

/**
 * View any input as bytes.
 *
 * Strings are UTF-8 encoded. Byte arrays are wrapped without copying, so the
 * result shares memory with the caller's array.
 *
 * @param input - Pattern or candidate
 * @returns Buffer over the input bytes
 *
 * @public
 */
export function toBytes(input: LikeInput): Buffer {
  if (typeof input === 'string') {
    return Buffer.from(input, 'utf8')
  }
  if (Buffer.isBuffer(input)) {
    return input
  }
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength)
}

/**
 * Map input to a string holding one character per byte (char codes 0-255).
 *
 * Regex engines match characters, not bytes. Feeding them this form makes
 * `[\s\S]` consume exactly one byte, the same unit `_` consumes in the
 * segment matcher.
 *
 * @public
 */
export function toByteString(input: LikeInput): string {
  return toBytes(input).toString('latin1')
}

