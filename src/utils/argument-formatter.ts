import { inspect } from 'node:util'
import type { DataRow, MethodParameter } from '../types/discovery.js'

export const MAX_STRING_DISPLAY_LENGTH = 50

/**
 * Placeholder name for values past the declared parameters
 */
export const UNKNOWN_PARAMETER_NAME = '???'

/**
 * Format a single argument value for a display name
 */
export function formatArgumentValue(value: unknown): string {
  try {
    if (value === undefined) return 'undefined'
    if (value === null) return 'null'

    if (typeof value === 'string') {
      return value.length > MAX_STRING_DISPLAY_LENGTH
        ? `${JSON.stringify(value.substring(0, MAX_STRING_DISPLAY_LENGTH))}...`
        : JSON.stringify(value)
    }

    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value)
    }

    if (typeof value === 'bigint') {
      return `${value}n`
    }

    if (typeof value === 'symbol') {
      return value.toString()
    }

    if (typeof value === 'function') {
      return value.name ? `[Function ${value.name}]` : '[Function]'
    }

    return inspect(value, {
      depth: 2,
      compact: true,
      maxArrayLength: 10,
      maxStringLength: MAX_STRING_DISPLAY_LENGTH,
      breakLength: Infinity,
      sorted: true
    })
  } catch (_error) {
    return '[Failed to format]'
  }
}

/**
 * Format a data row as `name: value` pairs. Values past the declared
 * parameters are labelled with UNKNOWN_PARAMETER_NAME.
 */
export function formatArguments(parameters: readonly MethodParameter[], row: DataRow): string {
  return row
    .map((value, index) => {
      const name = parameters[index]?.name ?? UNKNOWN_PARAMETER_NAME
      return `${name}: ${formatArgumentValue(value)}`
    })
    .join(', ')
}
