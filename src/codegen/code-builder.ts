/**
 * CodeBuilder - string builder with indentation support.
 */

export class CodeBuilder {
  private parts: string[] = [];
  private indentLevel: number = 0;
  private indentStr: string;
  private atLineStart: boolean = true;

  constructor(indentStr: string = "  ") {
    this.indentStr = indentStr;
  }

  /**
   * Add content, indenting each line that starts at a line boundary.
   */
  write(content: string): this {
    if (content.length === 0) return this;

    const lines = content.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (i > 0) {
        this.parts.push("\n");
        this.atLineStart = true;
      }
      if (line.length > 0) {
        if (this.atLineStart) {
          this.parts.push(this.indentStr.repeat(this.indentLevel));
          this.atLineStart = false;
        }
        this.parts.push(line);
      }
    }
    return this;
  }

  newline(): this {
    this.parts.push("\n");
    this.atLineStart = true;
    return this;
  }

  writeLine(content: string = ""): this {
    this.write(content);
    return this.newline();
  }

  /**
   * Write `open`, run `body` one level deeper, then write `close`.
   * `close` is left open-ended (no newline) so callers can chain
   * `} else {` onto it.
   */
  block(open: string, body: () => void, close: string = "}"): this {
    this.writeLine(open);
    this.indent();
    body();
    this.dedent();
    return this.write(close);
  }

  indent(): this {
    this.indentLevel++;
    return this;
  }

  dedent(): this {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
    return this;
  }

  build(): string {
    return this.parts.join("");
  }
}
