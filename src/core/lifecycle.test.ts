import { describe, expect, it, vi } from 'vitest';

import { argumentTypes } from '../arguments/index.js';
import { MemoryOutputStream } from '../io/index.js';
import { createTestHarness, exitCodeOf } from '../testing/harness.js';
import type { TestHarness } from '../testing/harness.js';
import { ToolError } from './errors.js';
import { ToolLifecycle } from './lifecycle.js';
import type { CommandLineArgumentDefinition } from './lifecycle.js';

interface CountOptions {
  count: number;
  label: string;
}

const countArguments: CommandLineArgumentDefinition<CountOptions> = {
  createOptions: () => ({ count: 0, label: 'items' }),
  defineArguments(parser, binder) {
    binder.bind(
      parser.addOption('--count <n>', {
        usage: 'How many',
        schema: argumentTypes.integer,
        required: true,
      }),
      (options, value) => {
        options.count = value;
      },
    );
    binder.bind(
      parser.addOption('--label <text>', {
        usage: 'What to call them',
        schema: argumentTypes.string,
      }),
      (options, value) => {
        options.label = value;
      },
    );
  },
};

function build(
  harness: TestHarness,
  args: readonly string[],
  definition: CommandLineArgumentDefinition<CountOptions> = countArguments,
): ToolLifecycle<CountOptions> {
  return new ToolLifecycle(
    definition,
    { toolName: 'count', usage: '[options]', overview: 'Counts things', args },
    harness.context,
  );
}

describe('ToolLifecycle construction', () => {
  it('binds --count=5 into the options', () => {
    const harness = createTestHarness();
    const lifecycle = build(harness, ['--count=5']);

    expect(lifecycle.options).toEqual({ count: 5, label: 'items' });
    expect(lifecycle.executionStatus).toBe('success');
    expect(lifecycle.originalWorkingDirectory).toBe('/work');
    expect(lifecycle.parser.commandName).toBe('toolkit count');
    expect(harness.stderr.text).toBe('');
  });

  it('populates every declared field from valid arguments', () => {
    const harness = createTestHarness();
    const lifecycle = build(harness, ['--count', '12', '--label', 'boxes']);

    expect(lifecycle.options).toEqual({ count: 12, label: 'boxes' });
  });

  it('freezes the options', () => {
    const lifecycle = build(createTestHarness(), ['--count=1']);
    expect(Object.isFrozen(lifecycle.options)).toBe(true);
  });

  it('names the command after the host program', () => {
    const lifecycle = build(createTestHarness({ hostProgram: 'kit' }), ['--count=1']);
    expect(lifecycle.parser.commandName).toBe('kit count');
  });

  it('exits with failure when --count is missing', async () => {
    const harness = createTestHarness();

    expect(await exitCodeOf(() => build(harness, []))).toBe(1);
    expect(harness.stderr.lines).toEqual([
      "error: required option '--count <n>' not specified",
      "note: run 'toolkit count --help' for usage",
    ]);
  });

  it('exits with failure when --count is not a number', async () => {
    const harness = createTestHarness();

    expect(await exitCodeOf(() => build(harness, ['--count=abc']))).toBe(1);
    expect(harness.stderr.lines[0]).toBe(
      "error: option '--count <n>' argument 'abc' is invalid. Expected an integer",
    );
  });

  it('exits before parsing when the working directory is unknown', async () => {
    const harness = createTestHarness({ cwd: undefined });
    const defineArguments = vi.fn();
    const createOptions = vi.fn(() => ({ count: 0, label: 'items' }));

    const code = await exitCodeOf(() =>
      build(harness, ['--count=5'], { createOptions, defineArguments }),
    );

    expect(code).toBe(1);
    expect(defineArguments).not.toHaveBeenCalled();
    expect(createOptions).not.toHaveBeenCalled();
    expect(harness.stderr.lines).toEqual([
      "error: couldn't determine the current working directory",
    ]);
  });

  it('exits with success after printing help', async () => {
    const harness = createTestHarness();

    expect(await exitCodeOf(() => build(harness, ['--help']))).toBe(0);
    expect(harness.stdout.text).toContain('Usage: toolkit count [options]');
    expect(harness.stderr.text).toBe('');
  });

  it('exits with failure when the post-processing hook throws', async () => {
    const harness = createTestHarness();
    const createOptions = vi.fn(() => ({ count: 0, label: 'items' }));

    const code = await exitCodeOf(() =>
      build(harness, ['--count=5'], {
        ...countArguments,
        createOptions,
        postprocessArgParserResult() {
          throw new ToolError('count and label disagree');
        },
      }),
    );

    expect(code).toBe(1);
    expect(createOptions).not.toHaveBeenCalled();
    expect(harness.stderr.lines).toEqual(['error: count and label disagree']);
  });

  it('keeps going when the post-processing hook only emits diagnostics', () => {
    const harness = createTestHarness();
    const lifecycle = build(harness, ['--count=5'], {
      ...countArguments,
      postprocessArgParserResult(_result, diagnostics) {
        diagnostics.emitError('count is suspicious');
      },
    });

    expect(lifecycle.options.count).toBe(5);
    expect(lifecycle.diagnostics.hasErrors).toBe(true);
    expect(harness.stderr.lines).toEqual(['error: count is suspicious']);
  });

  it('exits with failure when a binding throws', async () => {
    const harness = createTestHarness();
    const code = await exitCodeOf(() =>
      build(harness, ['--count=5'], {
        createOptions: () => ({ count: 0, label: 'items' }),
        defineArguments(parser, binder) {
          binder.bind(
            parser.addOption('--count <n>', {
              usage: 'How many',
              schema: argumentTypes.integer,
            }),
            () => {
              throw new Error('read-only');
            },
          );
        },
      }),
    );

    expect(code).toBe(1);
    expect(harness.stderr.lines).toEqual(["error: cannot bind '--count': read-only"]);
  });
});

describe('ToolLifecycle status and exit', () => {
  it('never returns to success once failed', () => {
    const lifecycle = build(createTestHarness(), ['--count=1']);
    lifecycle.markFailed();
    lifecycle.markFailed();
    expect(lifecycle.executionStatus).toBe('failure');
  });

  it('maps statuses to exit codes', async () => {
    const lifecycle = build(createTestHarness(), ['--count=1']);
    expect(await exitCodeOf(() => lifecycle.exit('success'))).toBe(0);
    expect(await exitCodeOf(() => lifecycle.exit('failure'))).toBe(1);
  });
});

describe('ToolLifecycle.redirectStdoutToStderr', () => {
  it('moves the lifecycle stream, the logger and diagnostics to stderr', () => {
    const diagnosticsOutput = new MemoryOutputStream();
    const harness = createTestHarness({ diagnosticsOutput });
    const lifecycle = build(harness, ['--count=1']);

    expect(lifecycle.stdoutStream).toBe(harness.stdout);
    lifecycle.log.info('before');
    lifecycle.diagnostics.emitNote('early');

    lifecycle.redirectStdoutToStderr();
    lifecycle.stdoutStream.write('plain\n');
    lifecycle.log.info('after');
    lifecycle.diagnostics.emitNote('late');

    expect(lifecycle.stdoutStream).toBe(harness.stderr);
    expect(harness.stdout.lines).toEqual(['before']);
    expect(diagnosticsOutput.lines).toEqual(['note: early']);
    expect(harness.stderr.lines).toEqual(['plain', 'after', 'note: late']);
  });

  it('stays redirected when called again', () => {
    const harness = createTestHarness();
    const lifecycle = build(harness, ['--count=1']);

    lifecycle.redirectStdoutToStderr();
    lifecycle.redirectStdoutToStderr();
    lifecycle.log.info('still here');

    expect(harness.stdout.text).toBe('');
    expect(harness.stderr.lines).toEqual(['still here']);
  });
});
