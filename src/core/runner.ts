import { DiagnosticsReportedErrors } from './errors.js';
import type { ToolLifecycle } from './lifecycle.js';

// ── CommandLineTool ──────────────────────────────────────────

/** A concrete tool: a lifecycle plus the work it does. */
export interface CommandLineTool<Options> {
  readonly base: ToolLifecycle<Options>;
  /** Tool logic. Report problems by throwing or by emitting error diagnostics. */
  runImpl(): void | Promise<void>;
}

// ── Driver ───────────────────────────────────────────────────

/**
 * Run a tool and exit. Error diagnostics left behind by a run that
 * returned normally fail it just like a thrown error does.
 */
export async function runTool<Options>(
  tool: CommandLineTool<Options>,
): Promise<never> {
  const { base } = tool;

  try {
    await tool.runImpl();
    if (base.diagnostics.hasErrors) {
      throw new DiagnosticsReportedErrors();
    }
  } catch (error) {
    base.markFailed();
    base.handleError(error);
  }

  return base.exit(base.executionStatus);
}
