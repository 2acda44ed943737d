/**
 * Type Guards
 *
 * Runtime checks for values produced by user-supplied data sources
 *
 * @module type-guards
 */

import type { DataRow } from '../types/discovery.js'

/**
 * Type guard for iterables. Strings are excluded: a string is never a
 * sequence of data rows.
 */
export function isIterable(value: unknown): value is Iterable<unknown> {
  if (value === null || value === undefined || typeof value === 'string') {
    return false
  }
  if (typeof value !== 'object' && typeof value !== 'function') {
    return false
  }
  return typeof Reflect.get(value, Symbol.iterator) === 'function'
}

/**
 * Type guard for a data row
 */
export function isDataRow(value: unknown): value is DataRow {
  return Array.isArray(value)
}

/**
 * Yields each value as a data row, throwing through `onInvalid` for any
 * value that is not an array
 */
export function* asDataRows(values: Iterable<unknown>, onInvalid: (value: unknown) => Error): Generator<DataRow> {
  for (const value of values) {
    if (!isDataRow(value)) {
      throw onInvalid(value)
    }
    yield value
  }
}
