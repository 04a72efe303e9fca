// ── OutputStream ────────────────────────────────────────────
// `process.stdout` and `process.stderr` satisfy this shape as-is.

export interface OutputStream {
  write(chunk: string): void;
}

/**
 * In-memory stream that keeps every chunk written to it.
 * Used wherever output has to be inspected instead of shown.
 */
export class MemoryOutputStream implements OutputStream {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  get text(): string {
    return this.chunks.join('');
  }

  /** Complete lines written so far, without their terminators. */
  get lines(): string[] {
    const text = this.text;
    if (text.length === 0) return [];
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
  }
}
