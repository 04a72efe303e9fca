/**
 * cli-lifecycle — lifecycle framework for command-line tools.
 *
 * A tool declares its arguments, gets typed options back, reports
 * problems through diagnostics or by throwing, and exits 0 or 1.
 */

export * from './arguments/index.js';
export * from './core/index.js';
export * from './diagnostics/index.js';
export * from './io/index.js';
export * from './schema/index.js';
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export { loadToolkitConfig, TOOLKIT, MANIFEST } from './config/index.js';
