/**
 * Diagnostic sink backed by the debug logger
 *
 * @module diagnostics
 */

import type { DiagnosticSink } from '../types/providers.js'
import { diagnosticsLogger } from '../utils/logger.js'

/**
 * Writes diagnostic messages to the theory-discovery:diagnostics namespace
 */
export class DebugDiagnosticSink implements DiagnosticSink {
  private debug = diagnosticsLogger()

  emit(message: string): void {
    this.debug('%s', message)
  }
}
