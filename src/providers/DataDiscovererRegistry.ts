/**
 * Data Discoverer Registry
 *
 * Default provider resolver: binds each directive to the discoverer for
 * its kind. Custom directives are looked up by the name they were
 * registered under.
 *
 * @module providers
 */

import type {
  CustomDataDirective,
  DataProviderDirective,
  TestMethod
} from '../types/discovery.js'
import type { DataDiscoverer, DataProvider, ProviderResolver } from '../types/providers.js'
import { ErrorMessages, ProviderResolutionError } from '../discovery/errors.js'
import { providersLogger } from '../utils/logger.js'
import { InlineDataDiscoverer } from './InlineDataDiscoverer.js'
import { MemberDataDiscoverer } from './MemberDataDiscoverer.js'
import { ClassDataDiscoverer } from './ClassDataDiscoverer.js'
import { FileDataDiscoverer } from './FileDataDiscoverer.js'

export type CustomDataDiscoverer = DataDiscoverer<CustomDataDirective>

/**
 * Binds a discoverer to one directive and method
 */
export function bindProvider<D extends DataProviderDirective>(
  discoverer: DataDiscoverer<D>,
  directive: D,
  method: TestMethod
): DataProvider {
  return {
    canEnumerateAhead: () => discoverer.supportsDiscoveryEnumeration(directive, method),
    rows: () => discoverer.getData(directive, method)
  }
}

/**
 * @example
 * ```typescript
 * const registry = new DataDiscovererRegistry()
 * registry.register('csv', new CsvDiscoverer())
 * const discoverer = createTheoryDiscoverer({ resolver: registry })
 * ```
 */
export class DataDiscovererRegistry implements ProviderResolver {
  private debug = providersLogger()
  private inline = new InlineDataDiscoverer()
  private member = new MemberDataDiscoverer()
  private classData = new ClassDataDiscoverer()
  private file = new FileDataDiscoverer()
  private custom = new Map<string, CustomDataDiscoverer>()

  constructor(custom: Record<string, CustomDataDiscoverer> = {}) {
    for (const [name, discoverer] of Object.entries(custom)) {
      this.register(name, discoverer)
    }
  }

  /**
   * Registers a discoverer for custom directives naming it, replacing any
   * previous one
   * @throws Error if the name is empty
   */
  register(name: string, discoverer: CustomDataDiscoverer): this {
    if (name.trim().length === 0) {
      throw new Error('Discoverer name must be a non-empty string')
    }
    if (this.custom.has(name)) {
      this.debug('Replacing data discoverer %s', name)
    }
    this.custom.set(name, discoverer)
    return this
  }

  has(name: string): boolean {
    return this.custom.has(name)
  }

  resolve(directive: DataProviderDirective, method: TestMethod): DataProvider {
    switch (directive.kind) {
      case 'inline':
        return bindProvider(this.inline, directive, method)
      case 'member':
        return bindProvider(this.member, directive, method)
      case 'class':
        return bindProvider(this.classData, directive, method)
      case 'file':
        return bindProvider(this.file, directive, method)
      case 'custom': {
        const discoverer = this.custom.get(directive.discoverer)
        if (!discoverer) {
          throw new ProviderResolutionError(ErrorMessages.UNKNOWN_DISCOVERER(directive.discoverer))
        }
        return bindProvider(discoverer, directive, method)
      }
    }
  }
}
