/**
 * Provider Type Definitions
 *
 * @module provider-types
 */

import type { DataProviderDirective, DataRow, TestMethod } from './discovery.js'

/**
 * A directive bound to its discoverer, ready to report its rows
 */
export interface DataProvider {
  /** False when rows need run-time context and cannot be listed during discovery */
  canEnumerateAhead(): boolean
  /** Realizes the rows in order; may throw */
  rows(): Iterable<DataRow>
}

/**
 * Produces rows for one kind of directive
 */
export interface DataDiscoverer<D extends DataProviderDirective = DataProviderDirective> {
  supportsDiscoveryEnumeration(directive: D, method: TestMethod): boolean
  getData(directive: D, method: TestMethod): Iterable<DataRow>
}

/**
 * Maps a directive to the provider that enumerates it
 */
export interface ProviderResolver {
  resolve(directive: DataProviderDirective, method: TestMethod): DataProvider
}

/**
 * Write-only channel for diagnostic messages
 */
export interface DiagnosticSink {
  emit(message: string): void
}
