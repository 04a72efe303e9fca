import { z } from 'zod';

// ── ExecutionStatus ─────────────────────────────────────────

export const executionStatusSchema = z.enum(['success', 'failure']);

export type ExecutionStatus = z.infer<typeof executionStatusSchema>;

// ── Exit codes ──────────────────────────────────────────────
// Only two codes ever leave the process.

export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

export function exitCodeFor(status: ExecutionStatus): ExitCode {
  switch (status) {
    case 'success':
      return EXIT_CODE.SUCCESS;
    case 'failure':
      return EXIT_CODE.FAILURE;
  }
}
