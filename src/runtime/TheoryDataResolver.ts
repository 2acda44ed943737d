/**
 * Theory Data Resolver
 *
 * Resolves the rows of a deferred theory case when it runs, through the
 * same provider resolver used during discovery. Providers are enumerated
 * whether or not they support discovery enumeration, and failures
 * propagate to the caller.
 *
 * @module runtime
 */

import type { DataProviderDirective, DataRow, TestMethod } from '../types/discovery.js'
import type { ProviderResolver } from '../types/providers.js'
import { DataDiscovererRegistry } from '../providers/DataDiscovererRegistry.js'
import { NoDataError } from '../discovery/errors.js'
import { coreLogger } from '../utils/logger.js'

export class TheoryDataResolver {
  private debug = coreLogger()
  private resolver: ProviderResolver

  constructor(resolver: ProviderResolver = new DataDiscovererRegistry()) {
    this.resolver = resolver
  }

  /**
   * @throws NoDataError when no directive yields a row
   */
  public resolve(method: TestMethod, data: readonly DataProviderDirective[]): DataRow[] {
    const rows: DataRow[] = []

    for (const directive of data) {
      const provider = this.resolver.resolve(directive, method)
      for (const row of provider.rows()) {
        rows.push(row)
      }
    }

    if (rows.length === 0) {
      throw new NoDataError(method)
    }

    this.debug('Resolved %d rows for %s.%s at run time', rows.length, method.testClass.name, method.name)
    return rows
  }
}
