/**
 * theory-discovery
 *
 * Expands parameterized test declarations into ordered, independently
 * reportable test cases, one per data row, or a single deferred case
 * when the data can only be resolved at run time.
 */

export type {
  TestClass,
  TestMethod,
  MethodParameter,
  DataRow,
  DataProviderDirective,
  DataProviderKind,
  InlineDataDirective,
  MemberDataDirective,
  ClassDataDirective,
  FileDataDirective,
  CustomDataDirective,
  TheoryDeclaration,
  DiscoveryOptions,
  MethodDisplay
} from './types/discovery.js'
export type {
  TestCase,
  TestCaseKind,
  SkippedTestCase,
  DataRowTestCase,
  TheoryTestCase,
  ExecutionErrorTestCase,
  TestCaseFactory
} from './types/test-case.js'
export type {
  DataProvider,
  DataDiscoverer,
  ProviderResolver,
  DiagnosticSink
} from './types/providers.js'

// Discovery
export {
  TheoryDiscoverer,
  createTheoryDiscoverer,
  type TheoryDiscovererDependencies,
  type EnumerationOutcome
} from './discovery/TheoryDiscoverer.js'
export {
  DiscoveryError,
  ProviderResolutionError,
  MemberDataError,
  ClassDataError,
  FileDataError,
  InvalidDataRowError,
  NoDataError,
  ErrorMessages,
  type DiscoveryErrorCode
} from './discovery/errors.js'

// Providers
export * from './providers/index.js'

// Test case construction
export { DefaultTestCaseFactory, formatMethodName } from './builders/TestCaseFactory.js'

// Diagnostics
export * from './diagnostics/index.js'

// Run-time resolution and registration
export * from './runtime/index.js'

// Configuration
export {
  DEFAULT_DISCOVERY_OPTIONS,
  normalizeDiscoveryOptions,
  validateDiscoveryOptions,
  discoveryOptionsFromEnv
} from './config/discovery-options.js'
