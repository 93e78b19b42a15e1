/**
 * DescriptorWriter - append-only line buffer for the generated file
 *
 * Usage:
 *   const writer = new DescriptorWriter();
 *   writer.line('#![allow(clippy::all,unused_imports)]');
 *   writer.text(config.imports);
 *   writeFileSync(outputPath, writer.toString());
 */

/**
 * Split text into lines. A trailing newline does not produce an empty last
 * line and `\r\n` endings are accepted.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (text.endsWith('\n')) lines.pop();
  return lines;
}

/**
 * `/// ` doc comment lines for a doc string (none for null or empty docs)
 */
export function docLines(docs: string | null | undefined): string[] {
  return splitLines(docs ?? '').map(line => `/// ${line}`);
}

export class DescriptorWriter {
  private readonly buffer: string[] = [];

  line(text = ''): this {
    this.buffer.push(text);
    return this;
  }

  lines(texts: Iterable<string>): this {
    for (const text of texts) {
      this.buffer.push(text);
    }
    return this;
  }

  /** Append free text, one entry per line */
  text(block: string): this {
    return this.lines(splitLines(block));
  }

  get lineCount(): number {
    return this.buffer.length;
  }

  toString(): string {
    return this.buffer.length === 0 ? '' : `${this.buffer.join('\n')}\n`;
  }
}
