// language/emitter.ts

import { LineBuffer } from "../core/line_buffer";
import { UnitContext } from "../core/context";
import { renderDiagnostic } from "../core/diagnostics";
import { leadingWhitespace } from "../core/text";
import { SourceLine } from "../types/symbols";
import { isReservedName } from "./names";

export const ADVISORY = "// Declarations need repairing; reference/pointers need to be replaced.";
export const INDEX_REPORT_PREFIX = "// Detected the following indicial variables: ";
export const REVIEW_PREFIX = "// Subscripts to review: ";

export interface EmitResult {
  text: string;
  indexVariables: string[];
}

export function renderPreamble(includes: string[]): string[] {
  return ["#define NOMINMAX", ...includes.map((h) => `#include <${h}>`)];
}

/** `if (` → `if(`, a trailing `) {` → `){` */
export function prettify(text: string): string {
  return text.replace(/\bif\s+\(/g, "if(").replace(/\)\s+\{\s*$/, "){");
}

export function needsSemicolon(text: string): boolean {
  if (/^\s*$/.test(text)) return false;
  if (/[{}]\s*$/.test(text)) return false;
  return !/^\s*\/\//.test(text);
}

/** The final text of one record: prettified, terminated and with its trailing comment. */
export function finishLine(line: SourceLine): string {
  let text = prettify(line.text);
  if (needsSemicolon(text)) text += ";";
  if (line.trailingComment) text += ` // ${line.trailingComment}`;
  return text;
}

/**
 * detectIndexVariables(lines, ctx):
 *   Names used inside `[...]` subscripts, in first-use order, without
 *   literals, arrays, reserved names and names that size an array.
 */
export function detectIndexVariables(lines: SourceLine[], ctx: UnitContext): string[] {
  const dimensionNames = new Set<string>();
  for (const symbol of ctx.symbols.entries()) {
    if (symbol.kind !== "vector" && symbol.kind !== "matrix") continue;
    for (const dim of symbol.dimensions) {
      for (const word of dim.match(/\w+/g) ?? []) dimensionNames.add(word);
    }
  }

  const found: string[] = [];
  for (const line of lines) {
    if (line.shape === "comment" || line.shape === "blank") continue;
    for (const bracket of line.text.matchAll(/\[([^\]]+)\]/g)) {
      for (const word of bracket[1].match(/\w+/g) ?? []) {
        if (/^\d/.test(word) || found.includes(word) || dimensionNames.has(word)) continue;
        if (isReservedName(word) || ctx.symbols.isArray(word)) continue;
        found.push(word);
      }
    }
  }
  return found;
}

/**
 * emitUnit(buffer, ctx):
 *   Assembles the output text: preamble, the unit (or the synthesized
 *   declarations first, with "leading" placement), the advisory trailer
 *   and any diagnostics whose line no longer exists.
 */
export function emitUnit(buffer: LineBuffer, ctx: UnitContext): EmitResult {
  const { options } = ctx;
  const lines = buffer.toArray();

  const unit: string[] = [];
  for (const line of lines) {
    const indent = leadingWhitespace(line.text);
    for (const d of ctx.diagnostics.forLine(line)) unit.push(`${indent}${renderDiagnostic(d)}`);
    unit.push(finishLine(line));
  }

  const indexVariables = detectIndexVariables(lines, ctx);
  const trailer = [ADVISORY];
  if (options.emitIndexReport) {
    trailer.push(`${INDEX_REPORT_PREFIX}${indexVariables.join(", ")}`.replace(/\s+$/, ""));
  }
  if (ctx.subscriptReview.length > 0) trailer.push(`${REVIEW_PREFIX}${ctx.subscriptReview.join(", ")}`);
  for (const d of ctx.diagnostics.detached(new Set(lines))) trailer.push(renderDiagnostic(d));

  const sections: string[][] = [];
  if (options.emitPreamble) sections.push(renderPreamble(options.includes));
  if (options.declarationPlacement === "leading") sections.push(ctx.declarations, unit);
  else sections.push(unit, ctx.declarations);
  sections.push(trailer);

  const text = sections
    .filter((s) => s.length > 0)
    .map((s) => s.join("\n"))
    .join("\n\n");
  return { text: `${text}\n`, indexVariables };
}
