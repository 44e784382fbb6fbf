/**
 * Splits on `\n`. Lines keep any `\r`; empty text yields a single empty line.
 */
export function splitLines(text: string): string[] {
  return text.split('\n');
}

function trimLineEnding(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Immutable text split into lines without terminators. A trailing `\n` does
 * not open another line, so empty text has no lines at all.
 */
export class Document {
  private readonly text: string;
  private readonly lineList: readonly string[];

  private constructor(text: string) {
    this.text = text;
    const lines = splitLines(text);
    if (text.length === 0 || text.endsWith('\n')) lines.pop();
    this.lineList = lines.map(trimLineEnding);
  }

  static fromString(text: string): Document {
    return new Document(text);
  }

  isEmpty(): boolean {
    return this.text.length === 0;
  }

  lineCount(): number {
    return this.lineList.length;
  }

  line(index: number): string | undefined {
    return this.lineList[index];
  }

  lines(): string[] {
    return [...this.lineList];
  }

  toString(): string {
    return this.text;
  }
}
