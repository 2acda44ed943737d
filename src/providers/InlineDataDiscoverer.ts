import type { DataRow, InlineDataDirective } from '../types/discovery.js'
import type { DataDiscoverer } from '../types/providers.js'

/**
 * One row of literal values per directive; always enumerable
 */
export class InlineDataDiscoverer implements DataDiscoverer<InlineDataDirective> {
  supportsDiscoveryEnumeration(): boolean {
    return true
  }

  getData(directive: InlineDataDirective): Iterable<DataRow> {
    return [[...directive.values]]
  }
}
