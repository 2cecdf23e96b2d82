/**
 * Frames decoded stream text into lines.
 *
 * Complete lines keep their "\n". A partial line is held back until its
 * newline arrives, it grows past `maxLineBytes`, or the caller flushes it.
 */
export class LineSplitter {
  private pending = "";

  constructor(private readonly maxLineBytes: number) {}

  get hasPending(): boolean {
    return this.pending.length > 0;
  }

  push(text: string): string[] {
    const data = this.pending + text;
    const lines: string[] = [];

    let start = 0;
    let newline = data.indexOf("\n", start);
    while (newline !== -1) {
      lines.push(data.slice(start, newline + 1));
      start = newline + 1;
      newline = data.indexOf("\n", start);
    }

    const rest = data.slice(start);
    if (rest.length > 0 && Buffer.byteLength(rest, "utf8") >= this.maxLineBytes) {
      lines.push(rest);
      this.pending = "";
    } else {
      this.pending = rest;
    }

    return lines;
  }

  flush(): string | null {
    if (!this.hasPending) return null;
    const rest = this.pending;
    this.pending = "";
    return rest;
  }
}
