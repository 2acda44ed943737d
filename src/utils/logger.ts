import createDebug from 'debug'

/**
 * Internal Debug Logger for theory-discovery
 *
 * Traces discovery decisions (skip, deferral, enumeration) and internal
 * failures. Diagnostic messages meant for the host go through a
 * DiagnosticSink instead.
 *
 * Usage:
 * - Enable with: DEBUG=theory-discovery:* npm test
 */

type Debugger = ReturnType<typeof createDebug>

/**
 * Factory for creating debug loggers with consistent namespacing
 */
export class LoggerFactory {
  private static debuggers = new Map<string, Debugger>()

  /**
   * Creates a debug logger with the specified namespace
   * @param namespace - Suffix appended to theory-discovery:
   */
  static create(namespace: string): Debugger {
    const fullNamespace = `theory-discovery:${namespace}`

    const existing = this.debuggers.get(fullNamespace)
    if (existing) {
      return existing
    }

    const created = createDebug(fullNamespace)
    this.debuggers.set(fullNamespace, created)
    return created
  }

  /**
   * Clears all cached debuggers
   */
  static clear(): void {
    this.debuggers.clear()
  }
}

export const coreLogger = (): Debugger => LoggerFactory.create('core')
export const providersLogger = (): Debugger => LoggerFactory.create('providers')
export const diagnosticsLogger = (): Debugger => LoggerFactory.create('diagnostics')
export const errorLogger = (): Debugger => LoggerFactory.create('error')
