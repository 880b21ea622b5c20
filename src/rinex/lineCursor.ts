import { truncatedRecord } from '../shared/index.js';

/**
 * Forward-only cursor over the input lines. Line numbers are 1-based and
 * refer to the original text so errors can point back into the file.
 */
export interface SourceLine {
  text: string;
  number: number;
}

export class LineCursor {
  private readonly iterator: Iterator<string>;
  private peeked: SourceLine | null = null;
  private exhausted = false;
  private lineNumber = 0;

  constructor(input: string | Iterable<string>) {
    const lines = typeof input === 'string' ? splitLines(input) : input;
    this.iterator = lines[Symbol.iterator]();
  }

  /** Number of the last line handed out by next(). */
  get position(): number {
    return this.peeked ? this.peeked.number - 1 : this.lineNumber;
  }

  peek(): SourceLine | null {
    if (this.peeked) return this.peeked;
    if (this.exhausted) return null;
    const result = this.iterator.next();
    if (result.done) {
      this.exhausted = true;
      return null;
    }
    this.lineNumber += 1;
    this.peeked = { text: stripLineEnd(result.value), number: this.lineNumber };
    return this.peeked;
  }

  next(): SourceLine | null {
    const line = this.peek();
    this.peeked = null;
    return line;
  }

  /** Next line of a record that cannot end here; running out is a truncation. */
  nextRequired(what: string, recordLine: number): SourceLine {
    const line = this.next();
    if (!line) {
      throw truncatedRecord(`Input ended inside ${what}`, { line: recordLine, endOfInput: true });
    }
    return line;
  }
}

function stripLineEnd(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function splitLines(text: string): string[] {
  const lines = text.split('\n');
  // A trailing newline does not open another line.
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Pad a line with blanks so fixed-column slices past its end read as blank. */
export function padLine(line: string, width: number): string {
  return line.length >= width ? line : line.padEnd(width, ' ');
}
