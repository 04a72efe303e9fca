/**
 * Configuration module.
 * Loads and validates runtime config from the environment.
 * Zod-validated.
 */

export { TOOLKIT, MANIFEST } from './defaults.js';
export { loadToolkitConfig } from './loader.js';
