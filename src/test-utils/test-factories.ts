/**
 * Test factory functions for theory discovery tests
 *
 * These factories build test methods, theory declarations and stub
 * discoverers with sensible defaults.
 */

import type {
  CustomDataDirective,
  DataRow,
  DiscoveryOptions,
  InlineDataDirective,
  TestMethod,
  TheoryDeclaration
} from '../types/discovery.js'
import type { CustomDataDiscoverer } from '../providers/DataDiscovererRegistry.js'

/**
 * Creates discovery options with pre-enumeration on
 * @param overrides - Optional property overrides
 */
export const createDiscoveryOptions = (overrides?: Partial<DiscoveryOptions>): DiscoveryOptions => ({
  preEnumerateTheories: true,
  methodDisplay: 'classAndMethod',
  ...overrides
})

/**
 * Creates a `MathTests.adds(left, right, sum)` test method
 * @param overrides - Optional property overrides
 */
export const createTestMethod = (overrides?: Partial<TestMethod>): TestMethod => ({
  testClass: { name: 'MathTests' },
  name: 'adds',
  parameters: [{ name: 'left' }, { name: 'right' }, { name: 'sum' }],
  ...overrides
})

/**
 * Creates a theory declaration for the default test method
 * @param overrides - Optional property overrides
 */
export const createTheory = (overrides?: Partial<TheoryDeclaration>): TheoryDeclaration => ({
  method: createTestMethod(),
  data: [],
  ...overrides
})

export const inline = (...values: unknown[]): InlineDataDirective => ({ kind: 'inline', values })

export const custom = (discoverer: string, ...args: unknown[]): CustomDataDirective => ({
  kind: 'custom',
  discoverer,
  args
})

/**
 * Stub behaviour for a custom discoverer
 */
export interface StubDiscovererOptions {
  rows?: DataRow[]
  enumerable?: boolean
  /** Thrown while the rows are realized */
  failWith?: unknown
}

/**
 * Creates a custom discoverer that counts how often its rows are read
 */
export const createStubDiscoverer = (
  options: StubDiscovererOptions = {}
): CustomDataDiscoverer & { getDataCalls: number } => {
  const stub = {
    getDataCalls: 0,
    supportsDiscoveryEnumeration: (): boolean => options.enumerable ?? true,
    getData: (): Iterable<DataRow> => {
      stub.getDataCalls += 1
      return realize(options)
    }
  }
  return stub
}

function* realize(options: StubDiscovererOptions): Generator<DataRow> {
  for (const row of options.rows ?? []) {
    yield row
  }
  if (options.failWith !== undefined) {
    throw options.failWith
  }
}
