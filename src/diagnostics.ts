/**
 * reqline - Diagnostic Stream
 * Human-readable side-channel lines (redirect trace, notes, metadata)
 */

export interface Diagnostics {
  note(line: string): void;
}

/**
 * Writes each note as a line to a stream, normally stderr
 */
export class StreamDiagnostics implements Diagnostics {
  constructor(private stream: NodeJS.WritableStream) {}

  note(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

/**
 * Collects notes in memory
 */
export class BufferedDiagnostics implements Diagnostics {
  readonly lines: string[] = [];

  note(line: string): void {
    this.lines.push(line);
  }

  /**
   * Lines beginning with a prefix, e.g. "→" for the redirect trace
   */
  withPrefix(prefix: string): string[] {
    return this.lines.filter((line) => line.startsWith(prefix));
  }
}
