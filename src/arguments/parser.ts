import { Argument, Command, CommanderError, InvalidArgumentError, Option } from 'commander';

import type { OutputStream } from '../io/index.js';
import { HelpRequested } from '../core/errors.js';
import {
  FlagArgument,
  ListArgument,
  ValueArgument,
} from './definition.js';
import type { ArgumentDefinition, ValueSchema } from './definition.js';
import { ArgumentDefinitionError, ArgumentParserError } from './errors.js';
import { ParseResult } from './result.js';

// ── Public types ─────────────────────────────────────────────

export interface ArgumentParserInit {
  commandName: string;
  usage: string;
  overview: string;
  seeAlso?: string | undefined;
  /** Where help and version text go. */
  output: OutputStream;
  errorOutput: OutputStream;
}

export interface OptionInit<T> {
  usage: string;
  schema: ValueSchema<T>;
  required?: boolean;
  /** Raw default, validated by `schema` like any other value. */
  defaultValue?: string;
}

export interface PositionalInit<T> {
  usage: string;
  schema: ValueSchema<T>;
  optional?: boolean;
}

// ── Helpers ──────────────────────────────────────────────────

const HELP_CODES = new Set([
  'commander.helpDisplayed',
  'commander.help',
  'commander.version',
]);

function validator<T>(schema: ValueSchema<T>): (value: string) => void {
  return (value) => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidArgumentError(
        parsed.error.issues.map((issue) => issue.message).join('; '),
      );
    }
  };
}

function stripErrorPrefix(message: string): string {
  return message.replace(/^error:\s*/, '');
}

// ── ArgumentParser ───────────────────────────────────────────

/**
 * Declares the arguments of one tool and parses raw argument lists
 * against them. Backed by a commander `Command` that never exits the
 * process and never prints errors itself.
 */
export class ArgumentParser {
  readonly commandName: string;

  private readonly command: Command;
  private readonly names = new Set<string>();
  private readonly options: { definition: ArgumentDefinition<unknown>; key: string }[] = [];
  private readonly positionals: ArgumentDefinition<unknown>[] = [];
  private parsed = false;

  constructor(init: ArgumentParserInit) {
    this.commandName = init.commandName;
    this.command = new Command(init.commandName)
      .usage(init.usage)
      .description(init.overview)
      .exitOverride()
      .allowExcessArguments(false)
      .configureOutput({
        writeOut: (str) => {
          init.output.write(str);
        },
        writeErr: (str) => {
          init.errorOutput.write(str);
        },
        outputError: () => {
          // reported through diagnostics by whoever catches the error
        },
      });

    if (init.seeAlso !== undefined) {
      this.command.addHelpText('after', `\nSEE ALSO: ${init.seeAlso}`);
    }
  }

  // ── Declaration ────────────────────────────────────────────

  /** An option taking one value, e.g. `--count <n>`. */
  addOption<T>(flags: string, init: OptionInit<T>): ArgumentDefinition<T> {
    const option = new Option(flags, init.usage);
    if (!option.required && !option.optional) {
      throw new ArgumentDefinitionError(`option '${flags}' must take a value`);
    }
    if (option.optional) {
      throw new ArgumentDefinitionError(
        `option '${flags}' must require its value, e.g. '--name <value>'`,
      );
    }
    if (option.variadic) {
      throw new ArgumentDefinitionError(
        `option '${flags}' is variadic; declare it as a list`,
      );
    }

    const validate = validator(init.schema);
    option.argParser((value: string) => {
      validate(value);
      return value;
    });
    if (init.required === true) option.makeOptionMandatory(true);
    if (init.defaultValue !== undefined) {
      if (!init.schema.safeParse(init.defaultValue).success) {
        throw new ArgumentDefinitionError(
          `default '${init.defaultValue}' of option '${flags}' is invalid`,
        );
      }
      option.default(init.defaultValue);
    }

    const definition = new ValueArgument(this.claim(option), init.usage, init.schema);
    this.register(option, definition);
    return definition;
  }

  /** An option collecting every value given, e.g. `--include <path...>`. */
  addList<T>(
    flags: string,
    init: Omit<OptionInit<T>, 'defaultValue'>,
  ): ArgumentDefinition<T[]> {
    const option = new Option(flags, init.usage);
    if (!option.variadic) {
      throw new ArgumentDefinitionError(
        `option '${flags}' must be variadic, e.g. '--name <value...>'`,
      );
    }

    const validate = validator(init.schema);
    option.argParser((value: string, previous: string[] | undefined) => {
      validate(value);
      return [...(previous ?? []), value];
    });
    if (init.required === true) option.makeOptionMandatory(true);

    const definition = new ListArgument(this.claim(option), init.usage, init.schema);
    this.register(option, definition);
    return definition;
  }

  /** A boolean switch, e.g. `--json`. */
  addFlag(flags: string, usage: string): ArgumentDefinition<boolean> {
    const option = new Option(flags, usage);
    if (option.required || option.optional) {
      throw new ArgumentDefinitionError(`flag '${flags}' must not take a value`);
    }

    const definition = new FlagArgument(this.claim(option), usage);
    this.register(option, definition);
    return definition;
  }

  addPositional<T>(name: string, init: PositionalInit<T>): ArgumentDefinition<T> {
    this.claimName(name);
    const validate = validator(init.schema);
    const argument = new Argument(
      init.optional === true ? `[${name}]` : `<${name}>`,
      init.usage,
    ).argParser((value: string) => {
      validate(value);
      return value;
    });
    this.command.addArgument(argument);

    const definition = new ValueArgument(name, init.usage, init.schema);
    this.positionals.push(definition);
    return definition;
  }

  // ── Parsing ────────────────────────────────────────────────

  /**
   * Parse `args` (without the program or tool name).
   * Throws `ArgumentParserError` on malformed input and `HelpRequested`
   * once help or version text has been written.
   */
  parse(args: readonly string[]): ParseResult {
    if (this.parsed) {
      throw new ArgumentDefinitionError(
        `'${this.commandName}' has already parsed its arguments`,
      );
    }
    this.parsed = true;

    try {
      this.command.parse([...args], { from: 'user' });
    } catch (error) {
      if (error instanceof CommanderError) {
        if (HELP_CODES.has(error.code)) {
          throw new HelpRequested();
        }
        throw new ArgumentParserError(stripErrorPrefix(error.message), {
          hint: `run '${this.commandName} --help' for usage`,
          cause: error,
        });
      }
      throw error;
    }

    return new ParseResult(this.collect());
  }

  // ── Internals ──────────────────────────────────────────────

  private claim(option: Option): string {
    const name = option.long ?? option.short ?? option.flags;
    this.claimName(name);
    return name;
  }

  private claimName(name: string): void {
    if (this.names.has(name)) {
      throw new ArgumentDefinitionError(`argument '${name}' is declared twice`);
    }
    this.names.add(name);
  }

  private register(option: Option, definition: ArgumentDefinition<unknown>): void {
    this.command.addOption(option);
    this.options.push({ definition, key: option.attributeName() });
  }

  private collect(): Map<ArgumentDefinition<unknown>, unknown> {
    const values = new Map<ArgumentDefinition<unknown>, unknown>();
    const opts = this.command.opts();
    for (const { definition, key } of this.options) {
      values.set(definition, opts[key]);
    }
    this.positionals.forEach((definition, index) => {
      values.set(definition, this.command.processedArgs[index]);
    });
    return values;
  }
}
