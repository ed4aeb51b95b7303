// language/comments.ts

import { LineBuffer } from "../core/line_buffer";
import { leadingWhitespace } from "../core/text";
import { SourceLine } from "../types/symbols";
import { TranslationStage } from "../types/stage";

const COMMENT_MARK = "// ";
/** Indentation narrower than this collapses to a bare "// ". */
const MIN_INDENT = 3;

function isCode(line: SourceLine): boolean {
  return line.shape !== "comment" && line.shape !== "blank";
}

/** A fixed-form comment still carrying its column-1 marker. */
function isRawComment(line: SourceLine): boolean {
  return line.shape === "comment" && !/^\s*\/\//.test(line.text);
}

/**
 * commentIndent(prev, next):
 *   Prefix for a comment between two code lines. With both neighbours the
 *   deeper indentation wins; with one, its last three columns make room
 *   for the marker.
 */
export function commentIndent(prev: string | undefined, next: string | undefined): string | undefined {
  if (prev !== undefined && next !== undefined) {
    const ws = next.length > prev.length ? next : prev;
    return ws.length < MIN_INDENT ? COMMENT_MARK : `${ws}${COMMENT_MARK}`;
  }
  const ws = prev ?? next;
  if (ws === undefined) return undefined;
  return ws.length < MIN_INDENT ? COMMENT_MARK : `${ws.slice(0, -MIN_INDENT)}${COMMENT_MARK}`;
}

/** "c     text" → prefix + "text" */
export function reflowComment(text: string, prefix: string | undefined): string {
  if (prefix === undefined) return `//${text.slice(1)}`.replace(/\s+$/, "");
  return `${prefix}${text.slice(1).replace(/^\s+/, "")}`.replace(/\s+$/, "");
}

export class CommentsStage implements TranslationStage {
  readonly name = "comments";

  run(buffer: LineBuffer): void {
    const lines = buffer.toArray();
    lines.forEach((line, index) => {
      if (!isRawComment(line)) return;
      const prev = lines.slice(0, index).reverse().find(isCode);
      const next = lines.slice(index + 1).find(isCode);
      const prefix = commentIndent(
        prev ? leadingWhitespace(prev.text) : undefined,
        next ? leadingWhitespace(next.text) : undefined
      );
      line.text = reflowComment(line.text, prefix);
    });
  }
}
