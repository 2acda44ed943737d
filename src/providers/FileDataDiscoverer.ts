/**
 * File Data Discoverer
 *
 * Reads rows from a JSON file holding an array of arrays. The file is
 * read each time rows are requested.
 *
 * @module providers
 */

import { readFileSync } from 'node:fs'
import path from 'node:path'
import type { DataRow, FileDataDirective } from '../types/discovery.js'
import type { DataDiscoverer } from '../types/providers.js'
import { ErrorMessages, FileDataError } from '../discovery/errors.js'
import { isDataRow } from '../utils/type-guards.js'

export class FileDataDiscoverer implements DataDiscoverer<FileDataDirective> {
  supportsDiscoveryEnumeration(): boolean {
    return true
  }

  getData(directive: FileDataDirective): Iterable<DataRow> {
    const filePath = path.resolve(directive.baseDir ?? process.cwd(), directive.path)

    let content: string
    try {
      content = readFileSync(filePath, 'utf8')
    } catch (error) {
      throw new FileDataError(ErrorMessages.FILE_UNREADABLE(filePath, describe(error)), {
        cause: error
      })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (error) {
      throw new FileDataError(ErrorMessages.FILE_UNREADABLE(filePath, describe(error)), {
        cause: error
      })
    }

    if (!Array.isArray(parsed) || !parsed.every(isDataRow)) {
      throw new FileDataError(ErrorMessages.FILE_NOT_ROWS(filePath))
    }

    return parsed
  }
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
