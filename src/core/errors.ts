import { ZodError } from 'zod';
import type { ZodIssue } from 'zod';

import type { DiagnosticsEngine } from '../diagnostics/index.js';

// ── Errors ───────────────────────────────────────────────────

export interface ToolErrorOptions {
  code?: string;
  /** Printed as a note after the error. */
  hint?: string;
  cause?: unknown;
}

/** Base class for every failure a tool reports on purpose. */
export class ToolError extends Error {
  readonly code: string;
  readonly hint: string | undefined;

  constructor(message: string, options: ToolErrorOptions = {}) {
    super(
      message,
      options.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = 'ToolError';
    this.code = options.code ?? 'tool_error';
    this.hint = options.hint;
  }
}

/**
 * Raised by the runner when a run finished without throwing but left
 * error diagnostics behind. Those diagnostics were printed already.
 */
export class DiagnosticsReportedErrors extends ToolError {
  constructor() {
    super('diagnostics reported errors', { code: 'diagnostics_reported_errors' });
    this.name = 'DiagnosticsReportedErrors';
  }
}

/** Help or version text was printed; there is nothing left to run. */
export class HelpRequested extends ToolError {
  constructor() {
    super('help displayed', { code: 'help_displayed' });
    this.name = 'HelpRequested';
  }
}

// ── Printing ─────────────────────────────────────────────────

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0
    ? `${issue.path.join('.')}: ${issue.message}`
    : issue.message;
}

/**
 * Print an error through the diagnostics engine.
 * Every caught error of a run ends up here, exactly once.
 */
export function handleError(
  error: unknown,
  diagnostics: DiagnosticsEngine,
): void {
  if (error instanceof DiagnosticsReportedErrors) {
    // Thrown by a tool with no error recorded.
    if (!diagnostics.hasErrors) diagnostics.emitError(error.message);
    return;
  }

  if (error instanceof ZodError && error.issues.length > 0) {
    for (const issue of error.issues) {
      diagnostics.emitError(formatIssue(issue));
    }
    return;
  }

  if (error instanceof ToolError) {
    diagnostics.emitError(error.message);
    if (error.hint !== undefined) {
      diagnostics.emitNote(error.hint);
    }
    return;
  }

  if (error instanceof Error) {
    diagnostics.emitError(error.message.length > 0 ? error.message : error.name);
    return;
  }

  diagnostics.emitError(String(error));
}
