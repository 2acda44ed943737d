/**
 * Discovery Type Definitions
 *
 * Shapes handed to the discoverer by the host: the declared test method,
 * its data-provider directives and the discovery options.
 *
 * @module discovery-types
 */

/**
 * The type that owns a test method
 */
export interface TestClass {
  /** Type name used in display names and messages */
  name: string
  /** Runtime object (class constructor or plain object) member data reads from */
  type?: object
}

/**
 * A formal parameter of a test method
 */
export interface MethodParameter {
  name: string
}

/**
 * A declared parameterized test method
 */
export interface TestMethod {
  readonly testClass: TestClass
  readonly name: string
  readonly parameters: readonly MethodParameter[]
}

/**
 * One row of arguments for a test method. Not checked against the
 * method's parameters.
 */
export type DataRow = readonly unknown[]

/**
 * A single row of literal values
 */
export interface InlineDataDirective {
  kind: 'inline'
  values: DataRow
}

/**
 * Rows read from a property, field or function on a type
 */
export interface MemberDataDirective {
  kind: 'member'
  /** Name of the member to read */
  member: string
  /** Object holding the member; defaults to the test class type */
  source?: object
  /** Arguments passed when the member is a function */
  parameters?: readonly unknown[]
  /** Forces the theory to resolve this member at run time */
  disableDiscoveryEnumeration?: boolean
}

/**
 * Rows produced by instantiating an iterable generator class
 */
export interface ClassDataDirective {
  kind: 'class'
  generator: new () => unknown
  disableDiscoveryEnumeration?: boolean
}

/**
 * Rows read from a JSON file holding an array of arrays
 */
export interface FileDataDirective {
  kind: 'file'
  path: string
  /** Directory relative paths resolve against; defaults to process.cwd() */
  baseDir?: string
}

/**
 * Rows produced by a discoverer registered under a name
 */
export interface CustomDataDirective {
  kind: 'custom'
  discoverer: string
  args?: readonly unknown[]
}

export type DataProviderDirective =
  | InlineDataDirective
  | MemberDataDirective
  | ClassDataDirective
  | FileDataDirective
  | CustomDataDirective

export type DataProviderKind = DataProviderDirective['kind']

/**
 * A theory: a test method plus its data-provider directives, in
 * declaration order
 */
export interface TheoryDeclaration {
  method: TestMethod
  data: readonly DataProviderDirective[]
  /** Theory-level skip reason */
  skip?: string | null
}

/**
 * How test case display names are built
 */
export type MethodDisplay = 'classAndMethod' | 'method'

/**
 * Options that control discovery
 */
export interface DiscoveryOptions {
  /** When false every theory becomes a single deferred case */
  preEnumerateTheories: boolean
  methodDisplay: MethodDisplay
}
