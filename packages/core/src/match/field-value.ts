/**
 * Row value tagging for the LIKE type gate.
 * @packageDocumentation
 */

import type { FieldValue } from '../types'

/**
 * String-like members of {@link FieldValue}.
 * @public
 */
export type StringLikeValue = Extract<FieldValue, { kind: 'string' | 'bytes' }>

/**
 * Check whether LIKE is defined for a value.
 *
 * @public
 */
export function isStringLike(value: FieldValue): value is StringLikeValue {
  return value.kind === 'string' || value.kind === 'bytes'
}

/**
 * Tag a plain runtime value.
 *
 * Integral numbers become `int`, other numbers `float`; `null` and
 * `undefined` become `null`; arrays are tagged element by element; any other
 * object (including dates and plain records) is `json`.
 *
 * @param value - Untyped row value
 * @returns The tagged value
 *
 * @public
 */
export function toFieldValue(value: unknown): FieldValue {
  if (value === null || value === undefined) {
    return { kind: 'null' }
  }
  if (value instanceof Uint8Array) {
    return { kind: 'bytes', value }
  }
  if (Array.isArray(value)) {
    return { kind: 'array', value: value.map((item: unknown) => toFieldValue(item)) }
  }

  switch (typeof value) {
    case 'string':
      return { kind: 'string', value }
    case 'boolean':
      return { kind: 'bool', value }
    case 'bigint':
      return { kind: 'int64', value }
    case 'number':
      return Number.isInteger(value) ? { kind: 'int', value } : { kind: 'float', value }
    default:
      return { kind: 'json', value }
  }
}
