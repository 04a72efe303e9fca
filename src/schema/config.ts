import { z } from 'zod';

// ── Environment config ──────────────────────────────────────

export const toolkitConfigSchema = z.object({
  hostProgram: z
    .string()
    .trim()
    .min(1)
    .regex(/^\S+$/, 'Host program must be a single word')
    .default('toolkit'),
});

export type ToolkitConfig = z.infer<typeof toolkitConfigSchema>;
