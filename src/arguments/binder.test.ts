import { describe, expect, it } from 'vitest';

import { ToolError } from '../core/errors.js';
import { MemoryOutputStream } from '../io/index.js';
import { ArgumentBinder } from './binder.js';
import { argumentTypes } from './definition.js';
import { ArgumentBindingError } from './errors.js';
import { ArgumentParser } from './parser.js';

interface RangeOptions {
  from: number;
  to: number;
  verbose: boolean;
  span: string | undefined;
}

function createRange(): RangeOptions {
  return { from: 0, to: 10, verbose: false, span: undefined };
}

function createParser(): ArgumentParser {
  return new ArgumentParser({
    commandName: 'toolkit range',
    usage: '[options]',
    overview: 'Ranges',
    output: new MemoryOutputStream(),
    errorOutput: new MemoryOutputStream(),
  });
}

describe('ArgumentBinder', () => {
  it('writes present values onto the options', () => {
    const parser = createParser();
    const binder = new ArgumentBinder<RangeOptions>();
    binder.bind(
      parser.addOption('--from <n>', { usage: 'Start', schema: argumentTypes.integer }),
      (options, value) => {
        options.from = value;
      },
    );
    binder.bind(parser.addFlag('--verbose', 'Talk more'), (options, value) => {
      options.verbose = value;
    });

    const options = createRange();
    binder.fill(parser.parse(['--from', '4', '--verbose']), options);

    expect(options).toEqual({ from: 4, to: 10, verbose: true, span: undefined });
  });

  it('keeps defaults for absent values', () => {
    const parser = createParser();
    const binder = new ArgumentBinder<RangeOptions>();
    binder.bind(
      parser.addOption('--to <n>', { usage: 'End', schema: argumentTypes.integer }),
      (options, value) => {
        options.to = value;
      },
    );

    const options = createRange();
    binder.fill(parser.parse([]), options);

    expect(options.to).toBe(10);
  });

  it('binds a pair when either value is present', () => {
    const parser = createParser();
    const binder = new ArgumentBinder<RangeOptions>();
    binder.bindPair(
      parser.addOption('--from <n>', { usage: 'Start', schema: argumentTypes.integer }),
      parser.addOption('--to <n>', { usage: 'End', schema: argumentTypes.integer }),
      (options, from, to) => {
        options.span = `${String(from ?? '*')}..${String(to ?? '*')}`;
      },
    );

    const options = createRange();
    binder.fill(parser.parse(['--to', '7']), options);

    expect(options.span).toBe('*..7');
  });

  it('skips a pair when both values are absent', () => {
    const parser = createParser();
    const binder = new ArgumentBinder<RangeOptions>();
    let called = false;
    binder.bindPair(
      parser.addOption('--from <n>', { usage: 'Start', schema: argumentTypes.integer }),
      parser.addOption('--to <n>', { usage: 'End', schema: argumentTypes.integer }),
      () => {
        called = true;
      },
    );

    binder.fill(parser.parse([]), createRange());

    expect(called).toBe(false);
  });

  it('wraps a failing binding in ArgumentBindingError', () => {
    const parser = createParser();
    const binder = new ArgumentBinder<RangeOptions>();
    binder.bind(
      parser.addOption('--from <n>', { usage: 'Start', schema: argumentTypes.integer }),
      (_options, value) => {
        if (value > 100) throw new RangeError('too far');
      },
    );

    const result = parser.parse(['--from', '500']);
    expect(() => binder.fill(result, createRange())).toThrow(
      new ArgumentBindingError("cannot bind '--from': too far"),
    );
  });

  it('lets tool errors through unchanged', () => {
    const parser = createParser();
    const binder = new ArgumentBinder<RangeOptions>();
    const failure = new ToolError('from must be even');
    binder.bind(parser.addFlag('--verbose', 'Talk more'), () => {
      throw failure;
    });

    const result = parser.parse(['--verbose']);
    expect(() => binder.fill(result, createRange())).toThrow(failure);
  });
});
