import { toolkitConfigSchema } from '../schema/config.js';
import type { ToolkitConfig } from '../schema/config.js';
import { TOOLKIT } from './defaults.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate the toolkit config from the environment.
 * Throws a ZodError if a variable is set to an unusable value.
 */
export function loadToolkitConfig(
  env: NodeJS.ProcessEnv = process.env,
): ToolkitConfig {
  return toolkitConfigSchema.parse({
    hostProgram: env[TOOLKIT.HOST_PROGRAM_ENV] ?? TOOLKIT.HOST_PROGRAM,
  });
}
