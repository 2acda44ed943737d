/**
 * Test utilities index
 */

export {
  createDiscoveryOptions,
  createTestMethod,
  createTheory,
  createStubDiscoverer,
  inline,
  custom,
  type StubDiscovererOptions
} from './test-factories.js'
