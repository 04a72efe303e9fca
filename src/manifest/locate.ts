import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { MANIFEST } from '../config/defaults.js';
import { ToolError } from '../core/errors.js';
import type { ToolErrorOptions } from '../core/errors.js';
import type { FileSystem } from '../io/index.js';

// ── Errors ───────────────────────────────────────────────────

export class ManifestNotFoundError extends ToolError {
  constructor(message: string, options: ToolErrorOptions = {}) {
    super(message, { code: 'manifest_not_found', ...options });
    this.name = 'ManifestNotFoundError';
  }
}

export class InvalidManifestError extends ToolError {
  constructor(message: string, options: ToolErrorOptions = {}) {
    super(message, { code: 'invalid_manifest', ...options });
    this.name = 'InvalidManifestError';
  }
}

// ── Lookup ───────────────────────────────────────────────────

/**
 * Find the manifest to check. An explicit path is resolved against
 * `directory`; otherwise the first existing candidate wins.
 */
export async function locateManifest(
  fileSystem: FileSystem,
  directory: string,
  explicitPath?: string,
): Promise<string> {
  if (explicitPath !== undefined) {
    const resolved = path.resolve(directory, explicitPath);
    if (!(await fileSystem.exists(resolved))) {
      throw new ManifestNotFoundError(`manifest not found: ${explicitPath}`);
    }
    return resolved;
  }

  for (const candidate of MANIFEST.CANDIDATES) {
    const resolved = path.join(directory, candidate);
    if (await fileSystem.exists(resolved)) {
      return resolved;
    }
  }

  throw new ManifestNotFoundError('root manifest not found', {
    hint: `looked for ${MANIFEST.CANDIDATES.join(', ')} in ${directory}`,
  });
}

// ── Parsing ──────────────────────────────────────────────────

/** Parse manifest text as JSON (`.json`) or YAML (anything else). */
export function parseManifestText(fileName: string, text: string): unknown {
  try {
    return fileName.endsWith('.json') ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidManifestError(`cannot parse ${fileName}: ${message}`, {
      cause: err,
    });
  }
}
