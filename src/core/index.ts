/**
 * Core lifecycle module.
 * Construction (parse, bind, capture) → runImpl → diagnostics check → exit.
 */

export { ToolLifecycle } from './lifecycle.js';
export type { CommandLineArgumentDefinition, ToolLifecycleInit } from './lifecycle.js';
export { runTool } from './runner.js';
export type { CommandLineTool } from './runner.js';
export { createToolContext, processExit } from './context.js';
export type { ProcessExit, ToolContext, ToolContextInit } from './context.js';
export {
  DiagnosticsReportedErrors,
  HelpRequested,
  ToolError,
  handleError,
} from './errors.js';
export type { ToolErrorOptions } from './errors.js';
