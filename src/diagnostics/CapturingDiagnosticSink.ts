import type { DiagnosticSink } from '../types/providers.js'

/**
 * Keeps every emitted message in order
 *
 * @example
 * ```typescript
 * const sink = new CapturingDiagnosticSink()
 * createTheoryDiscoverer({ sink }).discover(options, theory)
 * console.log(sink.messages)
 * ```
 */
export class CapturingDiagnosticSink implements DiagnosticSink {
  private captured: string[] = []

  get messages(): readonly string[] {
    return this.captured
  }

  emit(message: string): void {
    this.captured.push(message)
  }

  clear(): void {
    this.captured = []
  }
}
