/**
 * Diagnostics module.
 * Records what went wrong (or is worth mentioning) during a run
 * and prints each record as it arrives.
 */

export { DiagnosticsEngine } from './engine.js';
export type { DiagnosticsHandler } from './engine.js';
export { DiagnosticsPrinter, formatDiagnostic } from './printer.js';
