// core/line_buffer.ts

import { LineShape, SourceLine } from "../types/symbols";

/**
 * LineBuffer: the ordered sequence of logical lines every stage reads and
 * rewrites. Records are mutable objects, so a stage may keep a reference to
 * a line (the unit header, a call site) and find it again after other lines
 * were inserted or removed around it.
 *
 * Multi-line edits go through rewrite(): each record maps to zero or more
 * replacements and the new sequence replaces the old one in a single step,
 * which keeps indices from drifting while a stage is still iterating.
 */
export class LineBuffer {
  private lines: SourceLine[];

  constructor(lines: SourceLine[] = []) {
    this.lines = lines;
  }

  static fromTexts(texts: string[], shape: LineShape = "other"): LineBuffer {
    return new LineBuffer(texts.map((text, i) => ({ text, shape, origin: i + 1 })));
  }

  get length(): number {
    return this.lines.length;
  }

  at(index: number): SourceLine | undefined {
    return this.lines[index];
  }

  toArray(): SourceLine[] {
    return [...this.lines];
  }

  texts(): string[] {
    return this.lines.map((l) => l.text);
  }

  [Symbol.iterator](): Iterator<SourceLine> {
    return this.lines[Symbol.iterator]();
  }

  indexOf(line: SourceLine): number {
    return this.lines.indexOf(line);
  }

  find(predicate: (line: SourceLine) => boolean): SourceLine | undefined {
    return this.lines.find(predicate);
  }

  /**
   * rewrite(fn):
   *   Builds the next sequence by calling `fn` on every record in order.
   *   Returning `undefined` keeps the record as it is; returning an array
   *   splices those records in its place (an empty array deletes it).
   */
  rewrite(fn: (line: SourceLine, index: number) => SourceLine[] | undefined): void {
    const next: SourceLine[] = [];
    this.lines.forEach((line, index) => {
      const replacement = fn(line, index);
      if (replacement === undefined) next.push(line);
      else next.push(...replacement);
    });
    this.lines = next;
  }

  /** Inserts `added` directly after `anchor`; a missing anchor appends. */
  insertAfter(anchor: SourceLine, added: SourceLine[]): void {
    const index = this.lines.indexOf(anchor);
    if (index === -1) {
      this.lines.push(...added);
      return;
    }
    this.lines.splice(index + 1, 0, ...added);
  }

  remove(predicate: (line: SourceLine) => boolean): number {
    const before = this.lines.length;
    this.lines = this.lines.filter((l) => !predicate(l));
    return before - this.lines.length;
  }
}

/** A new record derived from `from`: same origin, new text and shape. */
export function deriveLine(from: SourceLine, text: string, shape: LineShape): SourceLine {
  return { text, shape, origin: from.origin };
}
