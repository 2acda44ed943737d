/**
 * Theory Discoverer
 *
 * Expands one theory declaration into the ordered test cases to register:
 *
 * - a skipped theory gives a single skipped case; its data is never read
 * - with pre-enumeration off, a single deferred (theory) case
 * - otherwise one data-row case per row, in directive then row order
 * - any directive that cannot be enumerated during discovery turns the
 *   whole theory into a single deferred case
 * - no rows at all gives a single execution-error case
 * - any failure while enumerating is reported to the diagnostic sink and
 *   gives a single deferred case
 *
 * @module discovery
 */

import type { DiscoveryOptions, TheoryDeclaration } from '../types/discovery.js'
import type { TestCase, TestCaseFactory } from '../types/test-case.js'
import type { DiagnosticSink, ProviderResolver } from '../types/providers.js'
import { DataDiscovererRegistry } from '../providers/DataDiscovererRegistry.js'
import { DefaultTestCaseFactory } from '../builders/TestCaseFactory.js'
import { DebugDiagnosticSink } from '../diagnostics/DebugDiagnosticSink.js'
import { coreLogger, errorLogger } from '../utils/logger.js'
import { ErrorMessages, formatErrorDetail, qualifiedName } from './errors.js'

/**
 * Result of the pre-enumeration attempt
 */
export type EnumerationOutcome<TCase> =
  | { status: 'enumerated'; cases: TCase[] }
  | { status: 'no-data'; cases: TCase[] }
  | { status: 'not-enumerable'; directiveIndex: number }
  | { status: 'failed'; error: unknown }

export interface TheoryDiscovererDependencies<TCase> {
  resolver: ProviderResolver
  factory: TestCaseFactory<TCase>
  sink: DiagnosticSink
}

export class TheoryDiscoverer<TCase = TestCase> {
  private debug = coreLogger()
  private debugError = errorLogger()
  private resolver: ProviderResolver
  private factory: TestCaseFactory<TCase>
  private sink: DiagnosticSink

  constructor(dependencies: TheoryDiscovererDependencies<TCase>) {
    this.resolver = dependencies.resolver
    this.factory = dependencies.factory
    this.sink = dependencies.sink
  }

  /**
   * Discover the test cases for a theory
   *
   * @returns A non-empty list of test cases, in registration order
   */
  public discover(options: DiscoveryOptions, theory: TheoryDeclaration): TCase[] {
    const { method } = theory

    // One skipped case rather than one per row; a skipped theory may have no data
    if (theory.skip !== null && theory.skip !== undefined) {
      this.debug('%s is skipped: %s', qualifiedName(method), theory.skip)
      return [this.factory.createSkipCase(options, method, theory.skip)]
    }

    if (!options.preEnumerateTheories) {
      this.debug('Pre-enumeration disabled; deferring %s', qualifiedName(method))
      return [this.factory.createTheoryCase(options, method)]
    }

    const outcome = this.enumerate(options, theory)

    switch (outcome.status) {
      case 'enumerated':
        this.debug('%s expanded into %d cases', qualifiedName(method), outcome.cases.length)
        return outcome.cases
      case 'no-data':
        this.debug('No data rows for %s', qualifiedName(method))
        return outcome.cases
      case 'not-enumerable':
        this.debug(
          'Directive %d of %s cannot be enumerated during discovery; deferring',
          outcome.directiveIndex,
          qualifiedName(method)
        )
        break
      case 'failed':
        this.emitDiagnostic(ErrorMessages.DISCOVERY_FALLBACK(method, formatErrorDetail(outcome.error)))
        break
    }

    return [this.factory.createTheoryCase(options, method)]
  }

  /**
   * Attempt to pre-enumerate every directive. Cases built before a
   * non-enumerable directive or a failure are dropped with the outcome.
   */
  private enumerate(options: DiscoveryOptions, theory: TheoryDeclaration): EnumerationOutcome<TCase> {
    const { method } = theory

    try {
      const cases: TCase[] = []

      for (const [directiveIndex, directive] of theory.data.entries()) {
        const provider = this.resolver.resolve(directive, method)

        if (!provider.canEnumerateAhead()) {
          return { status: 'not-enumerable', directiveIndex }
        }

        for (const dataRow of provider.rows()) {
          cases.push(this.factory.createDataRowCase(options, method, dataRow))
        }
      }

      if (cases.length === 0) {
        return {
          status: 'no-data',
          cases: [this.factory.createExecutionErrorCase(options, method, ErrorMessages.NO_DATA(method))]
        }
      }

      return { status: 'enumerated', cases }
    } catch (error) {
      return { status: 'failed', error }
    }
  }

  private emitDiagnostic(message: string): void {
    try {
      this.sink.emit(message)
    } catch (error) {
      this.debugError('Diagnostic sink rejected message: %O', error)
    }
  }
}

/**
 * Creates a discoverer producing the default test case objects, with the
 * built-in providers and a debug-backed diagnostic sink unless overridden
 */
export function createTheoryDiscoverer(
  dependencies: Partial<TheoryDiscovererDependencies<TestCase>> = {}
): TheoryDiscoverer<TestCase> {
  return new TheoryDiscoverer<TestCase>({
    resolver: dependencies.resolver ?? new DataDiscovererRegistry(),
    factory: dependencies.factory ?? new DefaultTestCaseFactory(),
    sink: dependencies.sink ?? new DebugDiagnosticSink()
  })
}
