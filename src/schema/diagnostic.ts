import { z } from 'zod';

// ── Severity ────────────────────────────────────────────────

export const diagnosticSeveritySchema = z.enum([
  'error',
  'warning',
  'note',
  'remark',
]);

export type DiagnosticSeverity = z.infer<typeof diagnosticSeveritySchema>;

// ── Diagnostic record ───────────────────────────────────────

export const diagnosticSchema = z.object({
  severity: diagnosticSeveritySchema,
  message: z.string().min(1),
  location: z.string().min(1).optional(),
});

export type Diagnostic = z.infer<typeof diagnosticSchema>;
