/**
 * Member Data Discoverer
 *
 * Reads rows from a property, field or function on the test class (or an
 * explicit source object). A function member is called with the
 * directive's parameters each time rows are requested.
 *
 * @module providers
 */

import type { DataRow, MemberDataDirective, TestMethod } from '../types/discovery.js'
import type { DataDiscoverer } from '../types/providers.js'
import { ErrorMessages, InvalidDataRowError, MemberDataError } from '../discovery/errors.js'
import { asDataRows, isIterable } from '../utils/type-guards.js'

export class MemberDataDiscoverer implements DataDiscoverer<MemberDataDirective> {
  supportsDiscoveryEnumeration(directive: MemberDataDirective): boolean {
    return directive.disableDiscoveryEnumeration !== true
  }

  getData(directive: MemberDataDirective, method: TestMethod): Iterable<DataRow> {
    const owner = directive.source ?? method.testClass.type
    const ownerName = this.describeOwner(directive.source, method)
    const { member } = directive

    if (owner === undefined || !(member in owner)) {
      throw new MemberDataError(ErrorMessages.MEMBER_NOT_FOUND(member, ownerName))
    }

    const value: unknown = Reflect.get(owner, member)
    let rows: Iterable<unknown>

    if (typeof value === 'function') {
      const result: unknown = Reflect.apply(value, owner, [...(directive.parameters ?? [])])
      if (!isIterable(result)) {
        throw new MemberDataError(ErrorMessages.MEMBER_RESULT_NOT_ITERABLE(member, ownerName))
      }
      rows = result
    } else if (isIterable(value)) {
      rows = value
    } else {
      throw new MemberDataError(ErrorMessages.MEMBER_NOT_ITERABLE(member, ownerName))
    }

    return asDataRows(
      rows,
      (row) => new InvalidDataRowError(ErrorMessages.INVALID_ROW(`Member '${member}' on ${ownerName}`, row))
    )
  }

  private describeOwner(source: object | undefined, method: TestMethod): string {
    if (source === undefined) {
      return method.testClass.name
    }
    const name: unknown = typeof source === 'function' ? Reflect.get(source, 'name') : undefined
    if (typeof name === 'string' && name.length > 0) {
      return name
    }
    return 'the provided source object'
  }
}
