import type { Diagnostic } from '../schema/index.js';
import type { OutputStream } from '../io/index.js';

// ── Formatting ──────────────────────────────────────────────

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const body = `${diagnostic.severity}: ${diagnostic.message}`;
  return diagnostic.location !== undefined
    ? `${diagnostic.location}: ${body}`
    : body;
}

// ── Printer ─────────────────────────────────────────────────

/**
 * The handler every diagnostics engine is wired with. Prints one line
 * per record, whatever its severity, to a single stream.
 */
export class DiagnosticsPrinter {
  private output: OutputStream;

  constructor(output: OutputStream) {
    this.output = output;
  }

  get outputStream(): OutputStream {
    return this.output;
  }

  redirectOutput(stream: OutputStream): void {
    this.output = stream;
  }

  readonly handle = (diagnostic: Diagnostic): void => {
    this.output.write(formatDiagnostic(diagnostic) + '\n');
  };
}
