/**
 * Test Case Type Definitions
 *
 * The four test case variants produced by discovery, and the factory
 * contract hosts implement to substitute their own case types.
 *
 * @module test-case-types
 */

import type { DataRow, DiscoveryOptions, TestMethod } from './discovery.js'

export type TestCaseKind = 'skipped' | 'data-row' | 'theory' | 'execution-error'

interface TestCaseBase {
  /** Stable identifier derived from the method and its data */
  id: string
  displayName: string
  method: TestMethod
}

/**
 * A theory skipped as a whole
 */
export interface SkippedTestCase extends TestCaseBase {
  kind: 'skipped'
  skipReason: string
}

/**
 * A case bound to one pre-enumerated data row
 */
export interface DataRowTestCase extends TestCaseBase {
  kind: 'data-row'
  dataRow: DataRow
}

/**
 * A deferred case; its rows are resolved when it runs
 */
export interface TheoryTestCase extends TestCaseBase {
  kind: 'theory'
}

/**
 * A case reporting that discovery found no usable data
 */
export interface ExecutionErrorTestCase extends TestCaseBase {
  kind: 'execution-error'
  errorMessage: string
}

export type TestCase = SkippedTestCase | DataRowTestCase | TheoryTestCase | ExecutionErrorTestCase

/**
 * Builds test cases for the discoverer. The discoverer never builds a
 * case itself.
 */
export interface TestCaseFactory<TCase = TestCase> {
  createSkipCase(options: DiscoveryOptions, method: TestMethod, skipReason: string): TCase
  createDataRowCase(options: DiscoveryOptions, method: TestMethod, dataRow: DataRow): TCase
  createTheoryCase(options: DiscoveryOptions, method: TestMethod): TCase
  createExecutionErrorCase(
    options: DiscoveryOptions,
    method: TestMethod,
    errorMessage: string
  ): TCase
}
