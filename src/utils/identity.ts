/**
 * Stable test case identifiers
 *
 * @module utils/identity
 */

import { createHash } from 'node:crypto'
import { inspect } from 'node:util'
import type { DataRow } from '../types/discovery.js'

/**
 * Hash the parts identifying a test case. Equal parts always give the
 * same id, so rediscovering a theory reproduces its case ids.
 * @returns Hex sha-256 digest
 */
export function hashIdentity(parts: readonly string[]): string {
  const hash = createHash('sha256')
  for (const part of parts) {
    // length prefix keeps ['ab', 'c'] and ['a', 'bc'] apart
    hash.update(`${part.length}:${part}`)
  }
  return hash.digest('hex')
}

/**
 * Encode a data row without the truncation applied to display names
 */
export function encodeRow(row: DataRow): string {
  return inspect(row, {
    depth: Infinity,
    maxArrayLength: Infinity,
    maxStringLength: Infinity,
    breakLength: Infinity,
    compact: true,
    sorted: true
  })
}
