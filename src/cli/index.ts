/**
 * CLI module — thin wrapper over core.
 * Picks a tool, hands it the process context, exits.
 * No business logic lives here.
 */

export { main, TOOLS } from './program.js';
export { ManifestArguments, ManifestTool } from './manifest.js';
export type { ManifestOptions } from './manifest.js';
