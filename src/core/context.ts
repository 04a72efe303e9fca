import { TOOLKIT } from '../config/defaults.js';
import { DiagnosticsEngine, DiagnosticsPrinter } from '../diagnostics/index.js';
import { localFileSystem } from '../io/index.js';
import type { FileSystem, OutputStream } from '../io/index.js';
import type { ExitCode } from '../schema/index.js';

// ── Process exit ─────────────────────────────────────────────

export type ProcessExit = (code: ExitCode) => never;

export const processExit: ProcessExit = (code) => process.exit(code);

// ── ToolContext ──────────────────────────────────────────────

/**
 * Everything a tool invocation shares with the process around it.
 * One context per process in production; one per test in tests.
 */
export interface ToolContext {
  /** First word of every command name, e.g. `toolkit` in `toolkit manifest`. */
  readonly hostProgram: string;
  readonly diagnostics: DiagnosticsEngine;
  readonly printer: DiagnosticsPrinter;
  readonly fileSystem: FileSystem;
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  readonly exit: ProcessExit;
}

export interface ToolContextInit {
  hostProgram?: string;
  fileSystem?: FileSystem;
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Where diagnostics print until output is redirected; stderr by default. */
  diagnosticsOutput?: OutputStream;
  exit?: ProcessExit;
}

export function createToolContext(init: ToolContextInit = {}): ToolContext {
  const stdout = init.stdout ?? process.stdout;
  const stderr = init.stderr ?? process.stderr;
  const printer = new DiagnosticsPrinter(init.diagnosticsOutput ?? stderr);

  return {
    hostProgram: init.hostProgram ?? TOOLKIT.HOST_PROGRAM,
    diagnostics: new DiagnosticsEngine([printer.handle]),
    printer,
    fileSystem: init.fileSystem ?? localFileSystem,
    stdout,
    stderr,
    exit: init.exit ?? processExit,
  };
}
