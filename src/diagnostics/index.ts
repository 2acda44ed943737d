export { DebugDiagnosticSink } from './DebugDiagnosticSink.js'
export { CapturingDiagnosticSink } from './CapturingDiagnosticSink.js'
