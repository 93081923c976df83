/**
 * Character cursor over netlist text.
 *
 * The value parser reads one character at a time and may step back by
 * one, which is all the lookahead the grammar needs.
 */

export interface SourceLocation {
  line: number;
  column: number;
}

export class CharStream {
  private readonly text: string;
  private offset = 0;

  constructor(text: string) {
    this.text = text;
  }

  /** Zero-based offset of the next character to be read. */
  get position(): number {
    return this.offset;
  }

  /** True when every character has been consumed. */
  get atEnd(): boolean {
    return this.offset >= this.text.length;
  }

  /**
   * Read the next character, or undefined at end of stream.
   * The cursor does not move past the end.
   */
  get(): string | undefined {
    if (this.offset >= this.text.length) {
      return undefined;
    }
    return this.text[this.offset++];
  }

  /** Step back over the last character read. Only valid after a successful get(). */
  unget(): void {
    if (this.offset > 0) {
      this.offset--;
    }
  }

  /** Text not yet consumed. */
  remaining(): string {
    return this.text.slice(this.offset);
  }

  /**
   * One-based line and column of the given offset (default: the last
   * character read).
   */
  location(at: number = Math.max(this.offset - 1, 0)): SourceLocation {
    let line = 1;
    let lineStart = 0;
    const end = Math.min(at, this.text.length);
    for (let i = 0; i < end; i++) {
      if (this.text[i] === "\n") {
        line++;
        lineStart = i + 1;
      }
    }
    return { line, column: end - lineStart + 1 };
  }
}
