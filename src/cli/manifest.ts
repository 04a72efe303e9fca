import path from 'node:path';

import { argumentTypes } from '../arguments/index.js';
import type {
  ArgumentBinder,
  ArgumentDefinition,
  ArgumentParser,
  ParseResult,
} from '../arguments/index.js';
import { MANIFEST } from '../config/defaults.js';
import { ToolError, ToolLifecycle } from '../core/index.js';
import type {
  CommandLineArgumentDefinition,
  CommandLineTool,
  ToolContext,
} from '../core/index.js';
import {
  checkManifest,
  locateManifest,
  parseManifestText,
} from '../manifest/index.js';
import { generateManifestReport, serializeJSON } from '../report/index.js';
import type { Manifest } from '../schema/index.js';

// ── Options ──────────────────────────────────────────────────

export interface ManifestOptions {
  manifestPath: string | undefined;
  json: boolean;
  strict: boolean;
  maxTools: number;
}

export class ManifestArguments
  implements CommandLineArgumentDefinition<ManifestOptions>
{
  private maxTools: ArgumentDefinition<number> | undefined;

  createOptions(): ManifestOptions {
    return {
      manifestPath: undefined,
      json: false,
      strict: false,
      maxTools: MANIFEST.MAX_TOOLS,
    };
  }

  defineArguments(
    parser: ArgumentParser,
    binder: ArgumentBinder<ManifestOptions>,
  ): void {
    binder.bind(
      parser.addOption('--manifest-path <path>', {
        usage: 'Manifest to check instead of the one in the working directory',
        schema: argumentTypes.path,
      }),
      (options, value) => {
        options.manifestPath = value;
      },
    );
    binder.bind(
      parser.addFlag('--json', 'Write a JSON report to stdout'),
      (options, value) => {
        options.json = value;
      },
    );
    binder.bind(
      parser.addFlag('--strict', 'Treat warnings as errors'),
      (options, value) => {
        options.strict = value;
      },
    );

    this.maxTools = parser.addOption('--max-tools <n>', {
      usage: `Largest number of tools allowed (default: ${String(MANIFEST.MAX_TOOLS)})`,
      schema: argumentTypes.integer,
    });
    binder.bind(this.maxTools, (options, value) => {
      options.maxTools = value;
    });
  }

  postprocessArgParserResult(result: ParseResult): void {
    if (this.maxTools === undefined) return;
    const maxTools = result.get(this.maxTools);
    if (maxTools !== undefined && maxTools < 1) {
      throw new ToolError('--max-tools must be at least 1', {
        code: 'invalid_argument',
      });
    }
  }
}

// ── Tool ─────────────────────────────────────────────────────

/**
 * `manifest` — check the toolkit manifest of a project.
 * With `--json`, stdout carries the report and nothing else.
 */
export class ManifestTool implements CommandLineTool<ManifestOptions> {
  readonly base: ToolLifecycle<ManifestOptions>;

  constructor(
    args: readonly string[],
    private readonly context: ToolContext,
  ) {
    this.base = new ToolLifecycle(
      new ManifestArguments(),
      {
        toolName: 'manifest',
        usage: '[options]',
        overview: "Check a project's toolkit manifest",
        args,
        seeAlso: `${context.hostProgram} --help`,
      },
      context,
    );
  }

  async runImpl(): Promise<void> {
    const { options, diagnostics, originalWorkingDirectory } = this.base;

    if (options.json) {
      this.base.redirectStdoutToStderr();
    }

    const manifestPath = await locateManifest(
      this.context.fileSystem,
      originalWorkingDirectory,
      options.manifestPath,
    );
    const fileName =
      path.relative(originalWorkingDirectory, manifestPath) ||
      path.basename(manifestPath);

    const text = await this.context.fileSystem.readFile(manifestPath);
    const manifest = checkManifest(
      parseManifestText(fileName, text),
      fileName,
      { strict: options.strict, maxTools: options.maxTools },
      diagnostics,
    );

    if (options.json) {
      const report = generateManifestReport({
        manifestPath: fileName,
        manifest,
        diagnostics: diagnostics.diagnostics,
      });
      this.context.stdout.write(serializeJSON(report) + '\n');
      return;
    }

    this.printSummary(fileName, manifest);
  }

  private printSummary(fileName: string, manifest: Manifest | undefined): void {
    const { log, diagnostics } = this.base;

    log.item('Manifest', fileName);
    if (manifest === undefined) {
      return;
    }

    log.item('Name', manifest.name);
    log.item('Version', manifest.version);
    log.item('Tools', String(manifest.tools.length));
    for (const tool of manifest.tools) {
      log.detail(`${tool.name} -> ${tool.entry}`);
    }
    if (!diagnostics.hasErrors) {
      log.info('Manifest is valid');
    }
  }
}
