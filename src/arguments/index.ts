/**
 * Arguments module.
 * Declares, parses and binds command-line arguments.
 * Commander does the tokenizing; zod validates every value.
 */

export { ArgumentParser } from './parser.js';
export type { ArgumentParserInit, OptionInit, PositionalInit } from './parser.js';
export { ArgumentBinder } from './binder.js';
export { ParseResult } from './result.js';
export {
  ArgumentDefinition,
  FlagArgument,
  ListArgument,
  ValueArgument,
  argumentTypes,
} from './definition.js';
export type { ValueSchema } from './definition.js';
export {
  ArgumentBindingError,
  ArgumentDefinitionError,
  ArgumentParserError,
} from './errors.js';
