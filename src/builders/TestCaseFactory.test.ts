import { describe, it, expect } from 'vitest'
import { DefaultTestCaseFactory, formatMethodName } from './TestCaseFactory.js'
import { createDiscoveryOptions, createTestMethod } from '../test-utils/index.js'

describe('DefaultTestCaseFactory', () => {
  const factory = new DefaultTestCaseFactory()
  const options = createDiscoveryOptions()
  const method = createTestMethod()

  it('names data-row cases after the method and its arguments', () => {
    const testCase = factory.createDataRowCase(options, method, [1, 'a'])

    expect(testCase).toMatchObject({
      kind: 'data-row',
      displayName: 'MathTests.adds(left: 1, right: "a")',
      dataRow: [1, 'a'],
      method
    })
  })

  it('labels values past the declared parameters', () => {
    const testCase = factory.createDataRowCase(options, method, [1, 2, 3, 4])

    expect(testCase.displayName).toBe('MathTests.adds(left: 1, right: 2, sum: 3, ???: 4)')
  })

  it('omits the class name when only the method is displayed', () => {
    const methodOnly = createDiscoveryOptions({ methodDisplay: 'method' })

    expect(factory.createDataRowCase(methodOnly, method, [7]).displayName).toBe('adds(left: 7)')
    expect(factory.createTheoryCase(methodOnly, method).displayName).toBe('adds')
    expect(formatMethodName(options, method)).toBe('MathTests.adds')
  })

  it('carries the variant data', () => {
    expect(factory.createSkipCase(options, method, 'not today')).toMatchObject({
      kind: 'skipped',
      displayName: 'MathTests.adds',
      skipReason: 'not today'
    })
    expect(factory.createExecutionErrorCase(options, method, 'No data')).toMatchObject({
      kind: 'execution-error',
      displayName: 'MathTests.adds',
      errorMessage: 'No data'
    })
  })

  it('derives stable ids from the method and data', () => {
    const first = factory.createDataRowCase(options, method, [1, 2, 3])
    const again = factory.createDataRowCase(options, method, [1, 2, 3])
    const other = factory.createDataRowCase(options, method, [1, 2, 4])

    expect(first.id).toMatch(/^[0-9a-f]{64}$/)
    expect(again.id).toBe(first.id)
    expect(other.id).not.toBe(first.id)
    expect(factory.createTheoryCase(options, method).id).not.toBe(
      factory.createSkipCase(options, method, '').id
    )
  })

  it('gives distinct ids to rows that only differ past the display truncation', () => {
    const prefix = 'a'.repeat(60)
    const longList = Array.from({ length: 11 }, (_, i) => i)
    const cases = [
      factory.createDataRowCase(options, method, [`${prefix}x`]),
      factory.createDataRowCase(options, method, [`${prefix}y`]),
      factory.createDataRowCase(options, method, [longList]),
      factory.createDataRowCase(options, method, [[...longList.slice(0, 10), 11]])
    ]

    expect(cases[0]?.displayName).toBe(cases[1]?.displayName)
    expect(new Set(cases.map((testCase) => testCase.id)).size).toBe(4)
  })
})
