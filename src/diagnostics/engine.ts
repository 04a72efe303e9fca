import type { Diagnostic, DiagnosticSeverity } from '../schema/index.js';

// ── Handler ─────────────────────────────────────────────────

export type DiagnosticsHandler = (diagnostic: Diagnostic) => void;

// ── Engine ──────────────────────────────────────────────────

/**
 * Collects the diagnostics of a run and forwards each one to the
 * registered handlers, in registration order.
 *
 * Records accumulate for the lifetime of the engine. Nothing clears
 * them except an explicit `reset()`.
 */
export class DiagnosticsEngine {
  private readonly records: Diagnostic[] = [];
  private readonly handlers: readonly DiagnosticsHandler[];

  constructor(handlers: readonly DiagnosticsHandler[] = []) {
    this.handlers = [...handlers];
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.records;
  }

  get hasErrors(): boolean {
    return this.records.some((d) => d.severity === 'error');
  }

  get errorCount(): number {
    return this.records.filter((d) => d.severity === 'error').length;
  }

  emit(diagnostic: Diagnostic): void {
    this.records.push(diagnostic);
    for (const handler of this.handlers) {
      handler(diagnostic);
    }
  }

  emitError(message: string, location?: string): void {
    this.emitWith('error', message, location);
  }

  emitWarning(message: string, location?: string): void {
    this.emitWith('warning', message, location);
  }

  emitNote(message: string, location?: string): void {
    this.emitWith('note', message, location);
  }

  emitRemark(message: string, location?: string): void {
    this.emitWith('remark', message, location);
  }

  reset(): void {
    this.records.length = 0;
  }

  private emitWith(
    severity: DiagnosticSeverity,
    message: string,
    location: string | undefined,
  ): void {
    this.emit({
      severity,
      message,
      ...(location !== undefined ? { location } : {}),
    });
  }
}
