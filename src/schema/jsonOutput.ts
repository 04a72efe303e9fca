import { z } from 'zod';

import { diagnosticSchema } from './diagnostic.js';
import { manifestEntrySchema } from './manifest.js';
import { executionStatusSchema } from './status.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Root output ─────────────────────────────────────────────

export const manifestReportSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  manifestPath: z.string().min(1),
  status: executionStatusSchema,
  name: z.string().optional(),
  manifestVersion: z.string().optional(),
  tools: z.array(manifestEntrySchema),
  diagnostics: z.array(diagnosticSchema),
});

export type ManifestReport = z.infer<typeof manifestReportSchema>;
