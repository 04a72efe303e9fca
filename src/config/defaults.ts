/**
 * Default configuration values.
 */

export const TOOLKIT = {
  HOST_PROGRAM: 'toolkit',
  HOST_PROGRAM_ENV: 'TOOLKIT_HOST_PROGRAM',
} as const;

export const MANIFEST = {
  // Searched in order in the original working directory.
  CANDIDATES: ['toolkit.yaml', 'toolkit.yml', 'toolkit.json'],
  MAX_TOOLS: 64,
} as const;
