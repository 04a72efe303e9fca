import type { DiagnosticsEngine } from '../diagnostics/index.js';
import { manifestSchema } from '../schema/index.js';
import type { Manifest } from '../schema/index.js';

export interface ManifestCheckOptions {
  /** Report warnings as errors. */
  strict: boolean;
  maxTools: number;
}

function at(fileName: string, segments: readonly (string | number)[]): string {
  return segments.length > 0 ? `${fileName}:${segments.join('.')}` : fileName;
}

/**
 * Validate a parsed manifest. Every problem becomes a diagnostic;
 * nothing is thrown. Returns the manifest when it matches the schema.
 */
export function checkManifest(
  raw: unknown,
  fileName: string,
  options: ManifestCheckOptions,
  diagnostics: DiagnosticsEngine,
): Manifest | undefined {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      diagnostics.emitError(issue.message, at(fileName, issue.path));
    }
    return undefined;
  }

  const manifest = parsed.data;
  const seen = new Set<string>();

  manifest.tools.forEach((tool, index) => {
    if (seen.has(tool.name)) {
      diagnostics.emitError(
        `duplicate tool name '${tool.name}'`,
        at(fileName, ['tools', index, 'name']),
      );
    }
    seen.add(tool.name);

    if (tool.summary === undefined) {
      const message = `tool '${tool.name}' has no summary`;
      const location = at(fileName, ['tools', index]);
      if (options.strict) {
        diagnostics.emitError(message, location);
      } else {
        diagnostics.emitWarning(message, location);
      }
    }
  });

  if (manifest.tools.length > options.maxTools) {
    diagnostics.emitError(
      `manifest declares ${String(manifest.tools.length)} tools; the limit is ${String(options.maxTools)}`,
      fileName,
    );
  }

  return manifest;
}
