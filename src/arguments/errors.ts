import { ToolError } from '../core/errors.js';
import type { ToolErrorOptions } from '../core/errors.js';

// ── Errors ───────────────────────────────────────────────────

/** The raw arguments do not match what the parser declares. */
export class ArgumentParserError extends ToolError {
  constructor(message: string, options: ToolErrorOptions = {}) {
    super(message, { code: 'argument_parser_error', ...options });
    this.name = 'ArgumentParserError';
  }
}

/** A tool declared its arguments inconsistently. */
export class ArgumentDefinitionError extends ToolError {
  constructor(message: string) {
    super(message, { code: 'argument_definition_error' });
    this.name = 'ArgumentDefinitionError';
  }
}

/** A parsed value could not be stored on the options value. */
export class ArgumentBindingError extends ToolError {
  constructor(message: string, options: ToolErrorOptions = {}) {
    super(message, { code: 'argument_binding_error', ...options });
    this.name = 'ArgumentBindingError';
  }
}
