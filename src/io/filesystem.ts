import { access, readFile } from 'node:fs/promises';
import path from 'node:path';

// ── FileSystem ──────────────────────────────────────────────

export interface FileSystem {
  /** `undefined` when the process has no usable working directory. */
  currentWorkingDirectory(): string | undefined;
  exists(filePath: string): Promise<boolean>;
  readFile(filePath: string): Promise<string>;
}

// ── Local filesystem ────────────────────────────────────────

export const localFileSystem: FileSystem = {
  currentWorkingDirectory(): string | undefined {
    try {
      return process.cwd();
    } catch {
      // cwd() throws ENOENT once the directory has been removed
      return undefined;
    }
  },

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  },

  async readFile(filePath: string): Promise<string> {
    return readFile(filePath, 'utf-8');
  },
};

// ── In-memory filesystem ────────────────────────────────────

export interface InMemoryFileSystemInit {
  cwd?: string | undefined;
  files?: Readonly<Record<string, string>>;
}

/**
 * Filesystem kept entirely in memory. Paths are normalized with
 * `path.resolve` against the configured working directory.
 */
export class InMemoryFileSystem implements FileSystem {
  private readonly cwd: string | undefined;
  private readonly files = new Map<string, string>();

  constructor(init: InMemoryFileSystemInit = {}) {
    this.cwd = init.cwd;
    for (const [filePath, content] of Object.entries(init.files ?? {})) {
      this.files.set(this.resolve(filePath), content);
    }
  }

  currentWorkingDirectory(): string | undefined {
    return this.cwd;
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(this.resolve(filePath));
  }

  async readFile(filePath: string): Promise<string> {
    const resolved = this.resolve(filePath);
    const content = this.files.get(resolved);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${resolved}'`);
    }
    return content;
  }

  private resolve(filePath: string): string {
    return path.resolve(this.cwd ?? '/', filePath);
  }
}
