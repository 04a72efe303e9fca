import type {
  Diagnostic,
  ExecutionStatus,
  Manifest,
} from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { ManifestReport } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { ManifestReport };

// ── JSON generator ───────────────────────────────────────────

export interface ManifestReportInput {
  manifestPath: string;
  manifest: Manifest | undefined;
  diagnostics: readonly Diagnostic[];
}

export function generateManifestReport(input: ManifestReportInput): ManifestReport {
  const status: ExecutionStatus = input.diagnostics.some(
    (d) => d.severity === 'error',
  )
    ? 'failure'
    : 'success';

  return {
    version: JSON_OUTPUT_VERSION,
    manifestPath: input.manifestPath,
    status,
    ...(input.manifest !== undefined
      ? { name: input.manifest.name, manifestVersion: input.manifest.version }
      : {}),
    tools: input.manifest?.tools ?? [],
    diagnostics: [...input.diagnostics],
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: ManifestReport): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  )) {
    sorted[k] = v;
  }
  return sorted;
}
