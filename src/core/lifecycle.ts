import { ArgumentBinder, ArgumentParser } from '../arguments/index.js';
import type { ParseResult } from '../arguments/index.js';
import type { DiagnosticsEngine } from '../diagnostics/index.js';
import type { OutputStream } from '../io/index.js';
import { exitCodeFor } from '../schema/index.js';
import type { ExecutionStatus } from '../schema/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { ToolContext } from './context.js';
import { HelpRequested, handleError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

/**
 * What a tool declares about its arguments: how to make an empty
 * options value, which arguments exist and where their values go.
 */
export interface CommandLineArgumentDefinition<Options> {
  createOptions(): Options;
  defineArguments(parser: ArgumentParser, binder: ArgumentBinder<Options>): void;
  /** Semantic checks across parsed values; may emit diagnostics or throw. */
  postprocessArgParserResult?(
    result: ParseResult,
    diagnostics: DiagnosticsEngine,
  ): void;
}

export interface ToolLifecycleInit {
  toolName: string;
  usage: string;
  overview: string;
  args: readonly string[];
  seeAlso?: string | undefined;
}

// ── ToolLifecycle ────────────────────────────────────────────

/**
 * Parses and binds a tool's arguments, owns its execution status and
 * output stream, and is the only way out of the process.
 *
 * Construction either yields fully bound options or exits: there is no
 * half-built lifecycle.
 */
export class ToolLifecycle<Options> {
  readonly options: Readonly<Options>;
  readonly originalWorkingDirectory: string;
  readonly parser: ArgumentParser;
  readonly diagnostics: DiagnosticsEngine;
  readonly log: Logger;

  private stream: OutputStream;
  private status: ExecutionStatus = 'success';

  constructor(
    definition: CommandLineArgumentDefinition<Options>,
    init: ToolLifecycleInit,
    private readonly context: ToolContext,
  ) {
    this.diagnostics = context.diagnostics;
    this.stream = context.stdout;
    this.log = createLogger(() => this.stream);

    // Before anything else: later steps may change directory.
    this.originalWorkingDirectory = this.captureWorkingDirectory();

    const { parser, options } = this.initialize(definition, init);
    this.parser = parser;
    this.options = options;
  }

  get stdoutStream(): OutputStream {
    return this.stream;
  }

  get executionStatus(): ExecutionStatus {
    return this.status;
  }

  /** Failure is final for the rest of the run. */
  markFailed(): void {
    this.status = 'failure';
  }

  /**
   * Send everything but data output to stderr: the lifecycle stream,
   * the logger and every diagnostic. There is no way back.
   */
  redirectStdoutToStderr(): void {
    this.stream = this.context.stderr;
    this.context.printer.redirectOutput(this.context.stderr);
  }

  handleError(error: unknown): void {
    handleError(error, this.diagnostics);
  }

  exit(status: ExecutionStatus): never {
    return this.context.exit(exitCodeFor(status));
  }

  // ── Construction steps ─────────────────────────────────────

  private captureWorkingDirectory(): string {
    const cwd = this.context.fileSystem.currentWorkingDirectory();
    if (cwd === undefined) {
      this.diagnostics.emitError("couldn't determine the current working directory");
      this.markFailed();
      return this.exit(this.status);
    }
    return cwd;
  }

  private initialize(
    definition: CommandLineArgumentDefinition<Options>,
    init: ToolLifecycleInit,
  ): { parser: ArgumentParser; options: Readonly<Options> } {
    try {
      const parser = new ArgumentParser({
        commandName: `${this.context.hostProgram} ${init.toolName}`,
        usage: init.usage,
        overview: init.overview,
        seeAlso: init.seeAlso,
        output: this.context.stdout,
        errorOutput: this.context.stderr,
      });

      const binder = new ArgumentBinder<Options>();
      definition.defineArguments(parser, binder);

      const result = parser.parse(init.args);
      definition.postprocessArgParserResult?.(result, this.diagnostics);

      const options = definition.createOptions();
      binder.fill(result, options);

      return { parser, options: Object.freeze(options) };
    } catch (error) {
      if (error instanceof HelpRequested) {
        return this.exit('success');
      }
      this.markFailed();
      this.handleError(error);
      return this.exit(this.status);
    }
  }
}
