import { z } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';

// ── Value schemas ────────────────────────────────────────────
// Every value arrives as a string; the schema validates and converts it.

export type ValueSchema<T> = ZodType<T, ZodTypeDef, string>;

// `+ 0` folds -0 into 0.
const integerText = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'Expected an integer')
  .transform((value) => Number(value) + 0);

const safeInteger = z.number().safe('Expected a safe integer');

export const argumentTypes = {
  string: z.string(),
  integer: integerText.pipe(safeInteger),
  positiveInteger: integerText.pipe(safeInteger.positive('Expected a positive integer')),
  path: z.string().trim().min(1, 'Expected a path'),
} as const;

// ── Definitions ──────────────────────────────────────────────

/**
 * Typed handle for one declared argument. Returned by the parser when
 * the argument is declared, then used to read or bind its value.
 */
export abstract class ArgumentDefinition<T> {
  constructor(
    readonly name: string,
    readonly usage: string,
  ) {}

  /** Convert the value stored by the parser, `undefined` when absent. */
  abstract decode(raw: unknown): T | undefined;
}

export class ValueArgument<T> extends ArgumentDefinition<T> {
  constructor(
    name: string,
    usage: string,
    private readonly schema: ValueSchema<T>,
  ) {
    super(name, usage);
  }

  override decode(raw: unknown): T | undefined {
    return typeof raw === 'string' ? this.schema.parse(raw) : undefined;
  }
}

export class ListArgument<T> extends ArgumentDefinition<T[]> {
  constructor(
    name: string,
    usage: string,
    private readonly schema: ValueSchema<T>,
  ) {
    super(name, usage);
  }

  override decode(raw: unknown): T[] | undefined {
    if (!Array.isArray(raw)) return undefined;
    return raw.map((value: unknown) => this.schema.parse(value));
  }
}

export class FlagArgument extends ArgumentDefinition<boolean> {
  override decode(raw: unknown): boolean | undefined {
    return typeof raw === 'boolean' ? raw : undefined;
  }
}
