// language/source_reader.ts

import { LineBuffer } from "../core/line_buffer";
import { SourceLine } from "../types/symbols";

const TAB_EXPANSION = " ".repeat(8);

/** Fixed-form comment: c, C, * or ! in column 1. */
export function isCommentLine(text: string): boolean {
  return /^[cC*!]/.test(text);
}

export function isBlankLine(text: string): boolean {
  return /^\s*$/.test(text);
}

/**
 * A continuation either starts with "$" as its first non-blank character or
 * carries a non-blank, non-zero marker in column 6 after five blanks.
 */
export function continuationBody(text: string): string | null {
  const dollar = /^\s*\$\s*(.*)$/.exec(text);
  if (dollar) return dollar[1];
  const column6 = /^ {5}[^ 0](.*)$/.exec(text);
  if (column6) return column6[1].replace(/^\s+/, "");
  return null;
}

/**
 * splitTrailingComment(text):
 *   Separates a trailing "!" comment that is not inside a quoted literal.
 */
export function splitTrailingComment(text: string): { code: string; comment?: string } {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (quote) {
      if (c === quote) quote = null;
    } else if (c === "'" || c === '"') {
      quote = c;
    } else if (c === "!") {
      const comment = text.slice(i + 1).trim();
      return { code: text.slice(0, i).replace(/\s+$/, ""), comment: comment || undefined };
    }
  }
  return { code: text.replace(/\s+$/, "") };
}

/**
 * readSource(source):
 *   Turns the raw file text into the Line Buffer the pipeline works on:
 *   tabs become eight spaces, comment and blank lines are tagged, trailing
 *   "!" comments are set aside, and continuation lines are joined onto the
 *   last code line before them.
 */
export function readSource(source: string): LineBuffer {
  const physical = source.split(/\r?\n/);
  if (physical.length > 0 && physical[physical.length - 1] === "") physical.pop();

  const lines: SourceLine[] = [];
  let lastCode: SourceLine | null = null;

  for (let i = 0; i < physical.length; i++) {
    const text = physical[i].replace(/\t/g, TAB_EXPANSION);
    const origin = i + 1;

    if (isCommentLine(text)) {
      lines.push({ text, shape: "comment", origin });
      continue;
    }
    if (isBlankLine(text)) {
      lines.push({ text: "", shape: "blank", origin });
      continue;
    }

    const body = lastCode ? continuationBody(text) : null;
    if (lastCode && body !== null) {
      const { code, comment } = splitTrailingComment(body);
      lastCode.text = `${lastCode.text} ${code}`;
      if (comment) {
        lastCode.trailingComment = lastCode.trailingComment
          ? `${lastCode.trailingComment} ${comment}`
          : comment;
      }
      continue;
    }

    const { code, comment } = splitTrailingComment(text);
    const line: SourceLine = { text: code, shape: "other", origin };
    if (comment) line.trailingComment = comment;
    lines.push(line);
    lastCode = line;
  }

  return new LineBuffer(lines);
}
