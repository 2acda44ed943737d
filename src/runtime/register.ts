/**
 * Registers discovered test cases with a host runner, in order
 *
 * @module runtime
 */

import type { TheoryDeclaration } from '../types/discovery.js'
import type { TestCase } from '../types/test-case.js'
import { DiscoveryError } from '../discovery/errors.js'
import { TheoryDataResolver } from './TheoryDataResolver.js'

/**
 * The part of a test runner's API needed to register cases
 *
 * @example
 * ```typescript
 * import { test } from 'vitest'
 * const registrar: TestRegistrar = {
 *   test: (name, fn) => test(name, fn),
 *   skip: (name) => test.skip(name)
 * }
 * ```
 */
export interface TestRegistrar {
  test(name: string, fn: () => Promise<void>): void
  skip(name: string, reason: string): void
}

export type TheoryBody = (...args: unknown[]) => unknown

/**
 * Registers each case with the registrar:
 * skipped cases as skipped tests, data-row cases as one test calling the
 * body with the row, deferred cases as one test running the body for every
 * row resolved at run time, and execution-error cases as a failing test
 */
export function registerTheory(
  registrar: TestRegistrar,
  theory: TheoryDeclaration,
  cases: readonly TestCase[],
  body: TheoryBody,
  dataResolver: TheoryDataResolver = new TheoryDataResolver()
): void {
  for (const testCase of cases) {
    switch (testCase.kind) {
      case 'skipped':
        registrar.skip(testCase.displayName, testCase.skipReason)
        break
      case 'data-row': {
        const row = testCase.dataRow
        registrar.test(testCase.displayName, async () => {
          await body(...row)
        })
        break
      }
      case 'theory':
        registrar.test(testCase.displayName, async () => {
          for (const row of dataResolver.resolve(theory.method, theory.data)) {
            await body(...row)
          }
        })
        break
      case 'execution-error': {
        const message = testCase.errorMessage
        registrar.test(testCase.displayName, async () => {
          throw new DiscoveryError(message)
        })
        break
      }
    }
  }
}
