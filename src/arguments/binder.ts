import { ToolError } from '../core/errors.js';
import type { ArgumentDefinition } from './definition.js';
import { ArgumentBindingError } from './errors.js';
import type { ParseResult } from './result.js';

type Binding<Options> = (result: ParseResult, options: Options) => void;

// ── ArgumentBinder ───────────────────────────────────────────

/**
 * Maps parsed values onto the fields of an options value.
 * Bindings run in declaration order and only for values that are present.
 */
export class ArgumentBinder<Options> {
  private readonly bindings: Binding<Options>[] = [];

  bind<T>(
    argument: ArgumentDefinition<T>,
    to: (options: Options, value: T) => void,
  ): void {
    this.bindings.push((result, options) => {
      const value = result.get(argument);
      if (value === undefined) return;
      guarded(argument.name, () => {
        to(options, value);
      });
    });
  }

  /** Bind two arguments together; runs when at least one is present. */
  bindPair<A, B>(
    first: ArgumentDefinition<A>,
    second: ArgumentDefinition<B>,
    to: (options: Options, first: A | undefined, second: B | undefined) => void,
  ): void {
    this.bindings.push((result, options) => {
      const a = result.get(first);
      const b = result.get(second);
      if (a === undefined && b === undefined) return;
      guarded(`${first.name}, ${second.name}`, () => {
        to(options, a, b);
      });
    });
  }

  fill(result: ParseResult, options: Options): void {
    for (const binding of this.bindings) {
      binding(result, options);
    }
  }
}

function guarded(name: string, bind: () => void): void {
  try {
    bind();
  } catch (error) {
    if (error instanceof ToolError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ArgumentBindingError(`cannot bind '${name}': ${message}`, {
      cause: error,
    });
  }
}
