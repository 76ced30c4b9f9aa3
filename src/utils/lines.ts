/**
 * Coalesces streamed text into lines. Both `\n` and a bare `\r` end a line,
 * so progress bars that redraw with `\r` show up as one line per redraw.
 * Empty lines are dropped, which also keeps `\r\n` from producing blanks.
 */
export class LineSplitter {
  private buffer = '';
  private readonly lines: string[] = [];

  constructor(private readonly onLine: (line: string) => void = () => {}) {}

  push(chunk: string): void {
    let start = 0;
    for (let i = 0; i < chunk.length; i++) {
      const ch = chunk[i];
      if (ch === '\n' || ch === '\r') {
        this.buffer += chunk.slice(start, i);
        this.flush();
        start = i + 1;
      }
    }
    this.buffer += chunk.slice(start);
  }

  /** Flush a trailing unterminated line. */
  end(): void {
    this.flush();
  }

  get captured(): readonly string[] {
    return this.lines;
  }

  text(): string {
    return this.lines.join('\n');
  }

  private flush(): void {
    if (!this.buffer) return;
    const line = this.buffer;
    this.buffer = '';
    this.lines.push(line);
    this.onLine(line);
  }
}
