/**
 * Informational output for tools.
 *
 * The logger resolves its stream on every write, so a tool that
 * redirects its output to stderr keeps stdout clean for data without
 * touching the logger. Data output never goes through here.
 */

import type { OutputStream } from '../io/index.js';

export interface Logger {
  info(message: string): void;
  detail(message: string): void;
  item(label: string, value: string): void;
}

export function createLogger(stream: () => OutputStream): Logger {
  // ── Core write ────────────────────────────────────────────

  function write(message: string): void {
    stream().write(message + '\n');
  }

  // ── Public API ────────────────────────────────────────────

  return {
    info(message: string): void {
      write(message);
    },

    detail(message: string): void {
      write(`   ${message}`);
    },

    item(label: string, value: string): void {
      write(`${label}: ${value}`);
    },
  };
}
