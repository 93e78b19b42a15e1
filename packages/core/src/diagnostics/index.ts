/**
 * Diagnostics - Recoverable outcomes of a generation run
 *
 * - DiagnosticCollector: collects exclusions and fallbacks
 * - DiagnosticWriter: writes them as a JSON lines log
 */

export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticCode } from './DiagnosticCollector.js';

export { DiagnosticWriter } from './DiagnosticWriter.js';
