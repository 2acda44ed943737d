import { describe, it, test, expect } from 'vitest'
import { registerTheory, type TestRegistrar } from './register.js'
import { TheoryDataResolver } from './TheoryDataResolver.js'
import { createTheoryDiscoverer } from '../discovery/TheoryDiscoverer.js'
import { CapturingDiagnosticSink } from '../diagnostics/CapturingDiagnosticSink.js'
import { DataDiscovererRegistry } from '../providers/DataDiscovererRegistry.js'
import { DiscoveryError } from '../discovery/errors.js'
import type { TheoryDeclaration } from '../types/discovery.js'
import type { TestCase } from '../types/test-case.js'
import {
  createDiscoveryOptions,
  createStubDiscoverer,
  createTheory,
  custom,
  inline
} from '../test-utils/index.js'

interface Registration {
  name: string
  fn?: () => Promise<void>
  skipReason?: string
}

const createRecordingRegistrar = (): TestRegistrar & { registrations: Registration[] } => {
  const registrations: Registration[] = []
  return {
    registrations,
    test: (name, fn) => {
      registrations.push({ name, fn })
    },
    skip: (name, skipReason) => {
      registrations.push({ name, skipReason })
    }
  }
}

const discover = (theory: TheoryDeclaration, registry = new DataDiscovererRegistry()): TestCase[] =>
  createTheoryDiscoverer({ resolver: registry, sink: new CapturingDiagnosticSink() }).discover(
    createDiscoveryOptions(),
    theory
  )

describe('registerTheory', () => {
  it('registers one test per data row, in order, calling the body with the row', async () => {
    const registrar = createRecordingRegistrar()
    const calls: unknown[][] = []
    const theory = createTheory({ data: [inline(1, 2, 3), inline(4, 5, 9)] })

    registerTheory(registrar, theory, discover(theory), (...args) => {
      calls.push(args)
    })

    expect(registrar.registrations.map((registration) => registration.name)).toEqual([
      'MathTests.adds(left: 1, right: 2, sum: 3)',
      'MathTests.adds(left: 4, right: 5, sum: 9)'
    ])
    for (const registration of registrar.registrations) {
      await registration.fn?.()
    }
    expect(calls).toEqual([
      [1, 2, 3],
      [4, 5, 9]
    ])
  })

  it('registers skipped theories as skipped tests', () => {
    const registrar = createRecordingRegistrar()
    const theory = createTheory({ skip: 'not yet', data: [inline(1, 2, 3)] })

    registerTheory(registrar, theory, discover(theory), () => undefined)

    expect(registrar.registrations).toEqual([{ name: 'MathTests.adds', skipReason: 'not yet' }])
  })

  it('resolves deferred rows when the test runs', async () => {
    const registrar = createRecordingRegistrar()
    const runtime = createStubDiscoverer({ rows: [[7, 7, 14]], enumerable: false })
    const registry = new DataDiscovererRegistry({ runtime })
    const theory = createTheory({ data: [inline(1, 1, 2), custom('runtime')] })
    const calls: unknown[][] = []

    registerTheory(
      registrar,
      theory,
      discover(theory, registry),
      async (...args) => {
        calls.push(args)
      },
      new TheoryDataResolver(registry)
    )

    expect(registrar.registrations.map((registration) => registration.name)).toEqual(['MathTests.adds'])
    expect(runtime.getDataCalls).toBe(0)

    await registrar.registrations[0]?.fn?.()

    expect(calls).toEqual([
      [1, 1, 2],
      [7, 7, 14]
    ])
  })

  it('registers a failing test for theories without data', async () => {
    const registrar = createRecordingRegistrar()
    const theory = createTheory()

    registerTheory(registrar, theory, discover(theory), () => undefined)

    const run = registrar.registrations[0]?.fn
    expect(run).toBeDefined()
    await expect(run?.()).rejects.toThrow(new DiscoveryError('No data found for MathTests.adds'))
  })
})

describe('registered with vitest', () => {
  const skipped: string[] = []
  const vitestRegistrar: TestRegistrar = {
    test: (name, fn) => test(name, fn),
    skip: (name, reason) => {
      skipped.push(reason)
      test.skip(`${name} (${reason})`)
    }
  }
  const theory = createTheory({ data: [inline(1, 2, 3), inline(-1, 1, 0)] })
  const skippedTheory = createTheory({ skip: 'rounding not implemented', data: [inline(0.1, 0.2, 0.3)] })

  registerTheory(vitestRegistrar, theory, discover(theory), (left, right, sum) => {
    expect(Number(left) + Number(right)).toBe(sum)
  })
  registerTheory(vitestRegistrar, skippedTheory, discover(skippedTheory), () => {
    throw new Error('skipped theories never run')
  })

  it('registers the skipped theory with its reason', () => {
    expect(skipped).toEqual(['rounding not implemented'])
  })
})
