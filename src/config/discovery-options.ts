/**
 * Discovery options
 *
 * @module config/discovery-options
 */

import type { DiscoveryOptions, MethodDisplay } from '../types/discovery.js'
import { coreLogger } from '../utils/logger.js'

/**
 * Default discovery options
 */
export const DEFAULT_DISCOVERY_OPTIONS: DiscoveryOptions = {
  preEnumerateTheories: true,
  methodDisplay: 'classAndMethod'
}

export const METHOD_DISPLAY_VALUES: readonly MethodDisplay[] = ['classAndMethod', 'method']

const isMethodDisplay = (value: unknown): value is MethodDisplay =>
  METHOD_DISPLAY_VALUES.some((display) => display === value)

/**
 * Fill unset options with their defaults
 */
export function normalizeDiscoveryOptions(options?: Partial<DiscoveryOptions>): DiscoveryOptions {
  return {
    preEnumerateTheories:
      options?.preEnumerateTheories ?? DEFAULT_DISCOVERY_OPTIONS.preEnumerateTheories,
    methodDisplay: options?.methodDisplay ?? DEFAULT_DISCOVERY_OPTIONS.methodDisplay
  }
}

/**
 * Validate discovery options received from untyped configuration
 * @throws Error if an option has the wrong type or value
 */
export function validateDiscoveryOptions(options: Partial<Record<keyof DiscoveryOptions, unknown>>): void {
  if (
    options.preEnumerateTheories !== undefined &&
    typeof options.preEnumerateTheories !== 'boolean'
  ) {
    throw new Error('preEnumerateTheories must be a boolean')
  }

  if (options.methodDisplay !== undefined && !isMethodDisplay(options.methodDisplay)) {
    throw new Error(`methodDisplay must be one of: ${METHOD_DISPLAY_VALUES.join(', ')}`)
  }
}

const parseBoolean = (value: string): boolean | undefined => {
  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') return true
  if (normalized === 'false' || normalized === '0') return false
  return undefined
}

/**
 * Read option overrides from THEORY_PRE_ENUMERATE and
 * THEORY_METHOD_DISPLAY. Unrecognized values are ignored.
 */
export function discoveryOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): Partial<DiscoveryOptions> {
  const debug = coreLogger()
  const overrides: Partial<DiscoveryOptions> = {}

  const preEnumerate = env.THEORY_PRE_ENUMERATE
  if (preEnumerate !== undefined) {
    const parsed = parseBoolean(preEnumerate)
    if (parsed === undefined) {
      debug('Ignoring THEORY_PRE_ENUMERATE=%s', preEnumerate)
    } else {
      overrides.preEnumerateTheories = parsed
    }
  }

  const methodDisplay = env.THEORY_METHOD_DISPLAY
  if (methodDisplay !== undefined) {
    if (isMethodDisplay(methodDisplay)) {
      overrides.methodDisplay = methodDisplay
    } else {
      debug('Ignoring THEORY_METHOD_DISPLAY=%s', methodDisplay)
    }
  }

  return overrides
}
