import { loadToolkitConfig } from '../config/index.js';
import { createToolContext, handleError, runTool } from '../core/index.js';
import type { ToolContext, ToolContextInit } from '../core/index.js';
import { EXIT_CODE } from '../schema/index.js';
import { ManifestTool } from './manifest.js';

// ── Tool registry ────────────────────────────────────────────

interface ToolEntry {
  summary: string;
  run(args: readonly string[], context: ToolContext): Promise<never>;
}

export const TOOLS: ReadonlyMap<string, ToolEntry> = new Map([
  [
    'manifest',
    {
      summary: "Check a project's toolkit manifest",
      run: (args: readonly string[], context: ToolContext) =>
        runTool(new ManifestTool(args, context)),
    },
  ],
]);

// ── Top-level help ───────────────────────────────────────────

function usage(hostProgram: string): string {
  const width = Math.max(...[...TOOLS.keys()].map((name) => name.length));
  const lines = [
    `Usage: ${hostProgram} <tool> [options]`,
    '',
    'Tools:',
    ...[...TOOLS].map(
      ([name, entry]) => `  ${name.padEnd(width)}  ${entry.summary}`,
    ),
    '',
    `Run '${hostProgram} <tool> --help' for the options of a tool.`,
  ];
  return lines.join('\n') + '\n';
}

// ── Entry ────────────────────────────────────────────────────

/**
 * Dispatch `argv` (without node and script) to the tool it names.
 * Never returns: every path ends in the context's exit.
 */
export async function main(
  argv: readonly string[],
  init: ToolContextInit = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<never> {
  const bootstrap = createToolContext(init);

  let hostProgram: string;
  try {
    hostProgram = init.hostProgram ?? loadToolkitConfig(env).hostProgram;
  } catch (err) {
    handleError(err, bootstrap.diagnostics);
    return bootstrap.exit(EXIT_CODE.FAILURE);
  }
  const context: ToolContext = { ...bootstrap, hostProgram };

  const [toolName, ...args] = argv;

  if (toolName === '--help' || toolName === '-h') {
    context.stdout.write(usage(hostProgram));
    return context.exit(EXIT_CODE.SUCCESS);
  }

  const entry = toolName !== undefined ? TOOLS.get(toolName) : undefined;
  if (entry === undefined) {
    context.diagnostics.emitError(
      toolName === undefined ? 'no tool specified' : `unknown tool '${toolName}'`,
    );
    context.diagnostics.emitNote(
      `available tools: ${[...TOOLS.keys()].join(', ')}`,
    );
    return context.exit(EXIT_CODE.FAILURE);
  }

  return entry.run(args, context);
}
