/**
 * Discovery errors
 *
 * Centralized messages and error classes for provider resolution and
 * data enumeration
 */

import type { TestMethod } from '../types/discovery.js'
import { formatArgumentValue } from '../utils/argument-formatter.js'

export const qualifiedName = (method: TestMethod): string =>
  `${method.testClass.name}.${method.name}`

export const ErrorMessages = {
  NO_DATA: (method: TestMethod): string => `No data found for ${qualifiedName(method)}`,
  DISCOVERY_FALLBACK: (method: TestMethod, detail: string): string =>
    `Exception thrown during theory discovery on '${qualifiedName(method)}'; falling back to single test case.\n${detail}`,
  UNKNOWN_DISCOVERER: (name: string): string => `No data discoverer registered under '${name}'`,
  MEMBER_NOT_FOUND: (member: string, owner: string): string =>
    `Could not find public static member (property, field, or method) named '${member}' on ${owner}`,
  MEMBER_NOT_ITERABLE: (member: string, owner: string): string =>
    `Member '${member}' on ${owner} must be an iterable of data rows or a function returning one`,
  MEMBER_RESULT_NOT_ITERABLE: (member: string, owner: string): string =>
    `Function '${member}' on ${owner} did not return an iterable of data rows`,
  CLASS_NOT_ITERABLE: (generator: string): string =>
    `${generator} must be iterable to be used as class data`,
  FILE_UNREADABLE: (path: string, reason: string): string =>
    `Could not read data file '${path}': ${reason}`,
  FILE_NOT_ROWS: (path: string): string => `Data file '${path}' must contain an array of arrays`,
  INVALID_ROW: (source: string, value: unknown): string =>
    `${source} yielded a data row that is not an array: ${formatArgumentValue(value)}`
}

export type DiscoveryErrorCode =
  | 'PROVIDER_RESOLUTION'
  | 'MEMBER_DATA'
  | 'CLASS_DATA'
  | 'FILE_DATA'
  | 'INVALID_ROW'
  | 'NO_DATA'
  | 'EXECUTION_ERROR'

export class DiscoveryError extends Error {
  readonly code: DiscoveryErrorCode

  constructor(message: string, code: DiscoveryErrorCode = 'EXECUTION_ERROR', options?: ErrorOptions) {
    super(message, options)
    this.name = 'DiscoveryError'
    this.code = code
  }
}

export class ProviderResolutionError extends DiscoveryError {
  constructor(message: string) {
    super(message, 'PROVIDER_RESOLUTION')
    this.name = 'ProviderResolutionError'
  }
}

export class MemberDataError extends DiscoveryError {
  constructor(message: string) {
    super(message, 'MEMBER_DATA')
    this.name = 'MemberDataError'
  }
}

export class ClassDataError extends DiscoveryError {
  constructor(message: string) {
    super(message, 'CLASS_DATA')
    this.name = 'ClassDataError'
  }
}

export class FileDataError extends DiscoveryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'FILE_DATA', options)
    this.name = 'FileDataError'
  }
}

export class InvalidDataRowError extends DiscoveryError {
  constructor(message: string) {
    super(message, 'INVALID_ROW')
    this.name = 'InvalidDataRowError'
  }
}

export class NoDataError extends DiscoveryError {
  constructor(method: TestMethod) {
    super(ErrorMessages.NO_DATA(method), 'NO_DATA')
    this.name = 'NoDataError'
  }
}

/**
 * Text describing a caught failure: its stack when present, else name and
 * message, else the value itself
 */
export function formatErrorDetail(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`
  }
  return formatArgumentValue(error)
}
