// language/lexical.ts

import { LineBuffer } from "../core/line_buffer";
import { UnitContext } from "../core/context";
import { getMatchingParenPos, getMatchingParenPosBackwards, mapOutsideQuotes } from "../core/text";
import { TranslationStage } from "../types/stage";

export function foldCase(line: string): string {
  return mapOutsideQuotes(line, (code) => code.toLowerCase());
}

/** Collapses multi-word and starred type names to the single keywords the declaration parser knows. */
export function collapseTypeNames(line: string): string {
  return line
    .replace(/\bdouble\s+precision\b/gi, "doubleprecision")
    .replace(/\bdouble\s+complex\b/gi, "doublecomplex")
    .replace(/\bcomplex\s*\*\s*16\b/gi, "doublecomplex")
    .replace(/\breal\s*\*\s*8\b/gi, "doubleprecision")
    .replace(/\binteger\s*\*\s*4\b/gi, "integer")
    .replace(/\blogical\s*\*\s*4\b/gi, "logical");
}

const DOTTED_OPERATORS: Array<[RegExp, string]> = [
  [/\.gt\./gi, " > "],
  [/\.ge\./gi, " >= "],
  [/\.lt\./gi, " < "],
  [/\.le\./gi, " <= "],
  [/\.eq\./gi, " == "],
  [/\.ne\./gi, " != "],
  [/\.not\./gi, " !"],
  [/\.and\./gi, " && "],
  [/\.or\./gi, " || "],
  [/\.true\./gi, "true"],
  [/\.false\./gi, "false"],
];

export function replaceComparisonOps(line: string): string {
  return mapOutsideQuotes(line, (code) =>
    DOTTED_OPERATORS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), code)
  );
}

/** 1.0d0 → 1.0e0, 2d-3 → 2e-3 */
export function fixNumericConstants(line: string): string {
  return mapOutsideQuotes(line, (code) =>
    code.replace(/(?<![\w.])(\d+(?:\.\d*)?|\.\d+)d([-+]?\d+)\b/gi, "$1e$2")
  );
}

function stripOuterParens(text: string): string {
  const match = /^\s*\((.*)\)\s*$/.exec(text);
  return match ? match[1] : text.trim();
}

/**
 * replaceExponent(line):
 *   Rewrites every `base**expo` into `pow(base, expo)`. Each side is a
 *   word (optionally a call such as `f(x)`) or a parenthesized group whose
 *   outer parentheses are dropped. Returns null when a side cannot be
 *   delimited, leaving the caller to report it.
 */
export function replaceExponent(line: string): string | null {
  let text = line;
  let star = text.indexOf("**");
  while (star !== -1) {
    let before = text.slice(0, star).replace(/\s+$/, "");
    let after = text.slice(star + 2).replace(/^\s+/, "");
    let base: string;
    let expo: string;

    if (before.endsWith(")")) {
      const open = getMatchingParenPosBackwards(before);
      if (open === -1) return null;
      const callee = /[\w.]+$/.exec(before.slice(0, open));
      if (callee) {
        base = before.slice(callee.index);
        before = before.slice(0, callee.index);
      } else {
        base = stripOuterParens(before.slice(open));
        before = before.slice(0, open);
      }
    } else {
      const word = /[\w.]+$/.exec(before);
      if (!word) return null;
      base = word[0];
      before = before.slice(0, word.index);
    }

    const sign = /^[-+]?/.exec(after)?.[0] ?? "";
    const rest = after.slice(sign.length);
    if (rest.startsWith("(")) {
      const close = getMatchingParenPos(rest);
      if (close === -1) return null;
      expo = sign + stripOuterParens(rest.slice(0, close + 1));
      after = rest.slice(close + 1);
    } else {
      const word = /^[\w.]+/.exec(rest);
      if (!word) return null;
      let end = word[0].length;
      if (rest[end] === "(") {
        const close = getMatchingParenPos(rest.slice(end));
        if (close === -1) return null;
        end += close + 1;
      }
      expo = sign + rest.slice(0, end);
      after = rest.slice(end);
    }

    text = `${before}pow(${base}, ${expo})${after}`;
    star = text.indexOf("**");
  }
  return text;
}

/**
 * LexicalStage: the literal token substitutions applied to every code line
 * before the symbol table exists.
 */
export class LexicalStage implements TranslationStage {
  readonly name = "lexical";

  run(buffer: LineBuffer, ctx: UnitContext): void {
    for (const line of buffer) {
      if (line.shape === "comment" || line.shape === "blank") continue;
      let text = foldCase(line.text);
      text = collapseTypeNames(text);
      text = replaceComparisonOps(text);
      text = fixNumericConstants(text);
      const powered = replaceExponent(text);
      if (powered === null) {
        ctx.diagnostics.report("unmatched-delimiter", "could not delimit the operands of '**'", line);
      } else {
        text = powered;
      }
      line.text = text;
    }
  }
}
