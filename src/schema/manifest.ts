import { z } from 'zod';

// ── Tool entry ──────────────────────────────────────────────

export const manifestEntrySchema = z.object({
  name: z.string().min(1),
  entry: z.string().min(1),
  summary: z.string().min(1).optional(),
});

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

// ── Full manifest ───────────────────────────────────────────

export const manifestSchema = z.object({
  name: z.string().min(1),
  version: z
    .string()
    .regex(/^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?$/, 'Expected a semantic version'),
  description: z.string().optional(),
  tools: z.array(manifestEntrySchema).default([]),
});

export type Manifest = z.infer<typeof manifestSchema>;
