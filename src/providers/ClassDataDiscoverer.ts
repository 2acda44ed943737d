import type { ClassDataDirective, DataRow } from '../types/discovery.js'
import type { DataDiscoverer } from '../types/providers.js'
import { ClassDataError, ErrorMessages, InvalidDataRowError } from '../discovery/errors.js'
import { asDataRows, isIterable } from '../utils/type-guards.js'

/**
 * Rows from a fresh instance of an iterable generator class
 */
export class ClassDataDiscoverer implements DataDiscoverer<ClassDataDirective> {
  supportsDiscoveryEnumeration(directive: ClassDataDirective): boolean {
    return directive.disableDiscoveryEnumeration !== true
  }

  getData(directive: ClassDataDirective): Iterable<DataRow> {
    const generatorName = directive.generator.name || 'Class data generator'
    const instance: unknown = new directive.generator()

    if (!isIterable(instance)) {
      throw new ClassDataError(ErrorMessages.CLASS_NOT_ITERABLE(generatorName))
    }

    return asDataRows(
      instance,
      (row) => new InvalidDataRowError(ErrorMessages.INVALID_ROW(generatorName, row))
    )
  }
}
