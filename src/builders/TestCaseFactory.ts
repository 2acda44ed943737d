/**
 * Test Case Factory
 *
 * Default factory for the four test case variants produced by discovery.
 *
 * @module builders
 */

import type { DataRow, DiscoveryOptions, TestMethod } from '../types/discovery.js'
import type {
  DataRowTestCase,
  ExecutionErrorTestCase,
  SkippedTestCase,
  TestCaseFactory,
  TestCaseKind,
  TheoryTestCase,
  TestCase
} from '../types/test-case.js'
import { formatArguments } from '../utils/argument-formatter.js'
import { encodeRow, hashIdentity } from '../utils/identity.js'

/**
 * Display name of a method under the given options
 */
export function formatMethodName(options: DiscoveryOptions, method: TestMethod): string {
  return options.methodDisplay === 'method'
    ? method.name
    : `${method.testClass.name}.${method.name}`
}

/**
 * Builds plain test case objects
 *
 * @example
 * ```typescript
 * const factory = new DefaultTestCaseFactory()
 * const testCase = factory.createDataRowCase(options, method, [1, 'a'])
 * // testCase.displayName === 'MathTests.adds(left: 1, right: "a")'
 * ```
 */
export class DefaultTestCaseFactory implements TestCaseFactory<TestCase> {
  createSkipCase(options: DiscoveryOptions, method: TestMethod, skipReason: string): SkippedTestCase {
    return {
      kind: 'skipped',
      id: this.buildId('skipped', method),
      displayName: formatMethodName(options, method),
      method,
      skipReason
    }
  }

  createDataRowCase(options: DiscoveryOptions, method: TestMethod, dataRow: DataRow): DataRowTestCase {
    const args = formatArguments(method.parameters, dataRow)
    return {
      kind: 'data-row',
      id: this.buildId('data-row', method, encodeRow(dataRow)),
      displayName: `${formatMethodName(options, method)}(${args})`,
      method,
      dataRow
    }
  }

  createTheoryCase(options: DiscoveryOptions, method: TestMethod): TheoryTestCase {
    return {
      kind: 'theory',
      id: this.buildId('theory', method),
      displayName: formatMethodName(options, method),
      method
    }
  }

  createExecutionErrorCase(
    options: DiscoveryOptions,
    method: TestMethod,
    errorMessage: string
  ): ExecutionErrorTestCase {
    return {
      kind: 'execution-error',
      id: this.buildId('execution-error', method, errorMessage),
      displayName: formatMethodName(options, method),
      method,
      errorMessage
    }
  }

  private buildId(kind: TestCaseKind, method: TestMethod, detail = ''): string {
    return hashIdentity([kind, method.testClass.name, method.name, detail])
  }
}
