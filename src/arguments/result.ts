import type { ArgumentDefinition } from './definition.js';

// ── ParseResult ──────────────────────────────────────────────

/** Values of one successful parse, keyed by their definitions. */
export class ParseResult {
  constructor(
    private readonly values: ReadonlyMap<ArgumentDefinition<unknown>, unknown>,
  ) {}

  get<T>(argument: ArgumentDefinition<T>): T | undefined {
    return argument.decode(this.values.get(argument));
  }

  has(argument: ArgumentDefinition<unknown>): boolean {
    return this.get(argument) !== undefined;
  }

  /** Names of the arguments that received a value. */
  get names(): string[] {
    return [...this.values.keys()]
      .filter((argument) => this.has(argument))
      .map((argument) => argument.name);
  }
}
