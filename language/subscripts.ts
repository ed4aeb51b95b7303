// language/subscripts.ts

import { LineBuffer } from "../core/line_buffer";
import { UnitContext } from "../core/context";
import { getMatchingParenPos, splitTopLevelCommas } from "../core/text";
import { FortranSymbol, LineShape, SourceLine } from "../types/symbols";
import { TranslationStage } from "../types/stage";
import { isReservedName } from "./names";

/** Shapes whose text is executable code and therefore scanned for references. */
const SCANNED_SHAPES: ReadonlySet<LineShape> = new Set<LineShape>([
  "loop",
  "loopEnd",
  "conditional",
  "goto",
  "call",
  "return",
  "assignment",
  "other",
]);

const SIMPLIFY_PASSES = 10;

/**
 * Rewrites applied to one freshly built bracket. Parentheses preceded by a
 * word character or "]" belong to a call or a subscript and are never
 * dropped.
 */
const SIMPLIFY_RULES: Array<[RegExp, string | ((...groups: string[]) => string)]> = [
  // (x) → x
  [/(?<![\w\]])\(\s*(\w+)\s*\)/g, "$1"],
  // (2-1) → 1, (1-2) → (-1)
  [
    /(?<![\w\]])\((\d+)([+-])(\d+)\)/g,
    (_m: string, a: string, op: string, b: string) => {
      const value = op === "+" ? Number(a) + Number(b) : Number(a) - Number(b);
      return value < 0 ? `(${value})` : `${value}`;
    },
  ],
  // [1-1] → [0]
  [
    /\[(\d+)([+-])(\d+)\]/g,
    (_m: string, a: string, op: string, b: string) =>
      `[${op === "+" ? Number(a) + Number(b) : Number(a) - Number(b)}]`,
  ],
  // ((x+1)-1) → (x), [(x-1)+1] → [x]
  [/([[(])\(([^()]+)\+1\)-1([\])])/g, "$1$2$3"],
  [/([[(])\(([^()]+)-1\)\+1([\])])/g, "$1$2$3"],
  // ((x-a)-b) → ((x)-((a)+(b))), same for +
  [/\(\(([^()]+)-(\w+)\)-(\w+)\)/g, "(($1)-(($2)+($3)))"],
  [/\(\(([^()]+)\+(\w+)\)\+(\w+)\)/g, "(($1)+(($2)+($3)))"],
];

/**
 * simplifySubscript(bracket):
 *   Best-effort clean-up of a linearized index such as
 *   `[((i)-1)+((j)-1)*(lda)]`. Runs the local rewrites a bounded number of
 *   times; what matches none of them stays as it is.
 */
export function simplifySubscript(bracket: string): string {
  let text = bracket;
  for (let pass = 0; pass < SIMPLIFY_PASSES; pass++) {
    const before = text;
    for (const [pattern, replacement] of SIMPLIFY_RULES) {
      text =
        typeof replacement === "string"
          ? text.replace(pattern, replacement)
          : text.replace(pattern, (...args: unknown[]) =>
              replacement(...args.slice(0, 4).map((a) => String(a)))
            );
    }
    if (text === before) break;
  }
  return text;
}

/** `v(i)` → `[(i)-1]` */
export function vectorSubscript(index: string): string {
  return `[(${index})-1]`;
}

/** `m(i,j)` with leading dimension `ld` → `[((i)-1)+((j)-1)*(ld)]` */
export function matrixSubscript(row: string, column: string, leadingDimension: string): string {
  return `[((${row})-1)+((${column})-1)*(${leadingDimension})]`;
}

interface Frame {
  /** Set when the parenthesis opens an actively tracked call argument list. */
  callee?: string;
}

function previousSignificant(text: string): string {
  const match = /(\S)\s*$/.exec(text);
  return match ? match[1] : "";
}

function nextSignificant(text: string, from: number): string {
  const match = /^\s*(\S)/.exec(text.slice(from));
  return match ? match[1] : "";
}

/**
 * SubscriptLinearizer: rewrites every `name(...)` whose name is a vector
 * or matrix into 0-based linear indexing on one piece of text, reporting
 * what it cannot rewrite through the unit's diagnostics.
 */
export class SubscriptLinearizer {
  constructor(
    private readonly ctx: UnitContext,
    private readonly line?: SourceLine
  ) {}

  rewrite(text: string): string {
    const call = /\bcall\s+(\w+)\s*\(/.exec(text);
    const callOpen = call ? call.index + call[0].length - 1 : -1;
    return this.scan(text, callOpen, call ? call[1] : undefined, true);
  }

  private scan(text: string, callOpen: number, callName: string | undefined, topLevel: boolean): string {
    const stack: Frame[] = [];
    let out = "";
    let i = 0;

    while (i < text.length) {
      const c = text[i];

      if (c === "'" || c === '"') {
        const end = text.indexOf(c, i + 1);
        const stop = end === -1 ? text.length : end + 1;
        out += text.slice(i, stop);
        i = stop;
        continue;
      }

      if (/[0-9.]/.test(c)) {
        const number = /^[\w.]+/.exec(text.slice(i));
        const token = number ? number[0] : c;
        out += token;
        i += token.length;
        continue;
      }

      if (/[A-Za-z_]/.test(c)) {
        const ident = /^\w+/.exec(text.slice(i));
        const name = ident ? ident[0] : c;
        const afterName = i + name.length;
        const paren = /^\s*\(/.exec(text.slice(afterName));
        const symbol = this.ctx.symbols.lookup(name);

        if (paren && symbol && (symbol.kind === "vector" || symbol.kind === "matrix")) {
          const open = afterName + paren[0].length - 1;
          const consumed = this.rewriteReference(text, open, symbol, stack, out);
          if (consumed) {
            out = consumed.out;
            i = consumed.next;
            continue;
          }
          out += text.slice(i);
          break;
        }

        if (paren && this.ctx.symbols.isCallable(name)) {
          const open = afterName + paren[0].length - 1;
          out += text.slice(i, open + 1);
          stack.push({ callee: name });
          i = open + 1;
          continue;
        }

        // The subroutine named by a CALL is resolved by the call stage.
        const isCallTarget = paren !== null && afterName + paren[0].length - 1 === callOpen;
        if (paren && !isCallTarget) this.reportUnresolved(name, symbol, out, topLevel);
        out += name;
        i = afterName;
        continue;
      }

      if (c === "(") {
        stack.push(i === callOpen && callName ? { callee: callName } : {});
      } else if (c === ")") {
        if (stack.length === 0) {
          this.ctx.diagnostics.report("unmatched-delimiter", "unmatched ')'", this.line);
        } else {
          stack.pop();
        }
      }
      out += c;
      i++;
    }

    if (topLevel && stack.length > 0) {
      this.ctx.diagnostics.report("unmatched-delimiter", "unclosed '('", this.line);
    }
    return out;
  }

  /**
   * rewriteReference(text, open, symbol, stack, out):
   *   Handles one `name(...)` reference whose "(" sits at `open`. Returns
   *   the extended output and the index after the closing ")", or null
   *   when the parentheses never close.
   */
  private rewriteReference(
    text: string,
    open: number,
    symbol: FortranSymbol,
    stack: Frame[],
    out: string
  ): { out: string; next: number } | null {
    const name = symbol.name;
    const close = getMatchingParenPos(text.slice(open));
    if (close === -1) {
      this.ctx.diagnostics.report("unmatched-delimiter", `unclosed '(' after ${name}`, this.line);
      return null;
    }
    const end = open + close;
    const inner = text.slice(open + 1, end);
    const terms = splitTopLevelCommas(inner, (m) =>
      this.ctx.diagnostics.report("unmatched-delimiter", `${m} in the subscript of ${name}`, this.line)
    ).map((t) => t.trim());
    const rewritten = terms.map((t) => this.scan(t, -1, undefined, false));

    let bracket: string | null = null;
    if (symbol.kind === "vector" && rewritten.length === 1) {
      bracket = vectorSubscript(rewritten[0]);
    } else if (symbol.kind === "matrix" && rewritten.length === 2) {
      if (terms.some((t) => t.includes(","))) {
        this.flagAmbiguous(`${name}(${inner})`, "an index holds a nested argument list");
      }
      bracket = matrixSubscript(rewritten[0], rewritten[1], symbol.dimensions[0]);
    } else {
      this.flagAmbiguous(
        `${name}(${inner})`,
        `${symbol.kind} ${name} is referenced with ${terms.length} index terms`
      );
    }

    if (bracket === null) {
      return { out: `${out}${name}(${rewritten.join(",")})`, next: end + 1 };
    }
    if (this.ctx.options.simplifySubscripts) bracket = simplifySubscript(bracket);

    const frame = stack[stack.length - 1];
    let prefix = "";
    if (frame?.callee) {
      const whole =
        ["(", ","].includes(previousSignificant(out)) && [",", ")"].includes(nextSignificant(text, end + 1));
      if (whole) {
        prefix = "&";
        if (symbol.kind === "matrix") {
          this.ctx.diagnostics.info(
            "leading-dimension",
            `${name}(${inner}) is passed to ${frame.callee}, which indexes it with its own leading dimension`,
            this.line
          );
        }
      } else {
        this.ctx.diagnostics.info(
          "computed-reference",
          `${name}(${inner}) is part of a computed argument to ${frame.callee}; it is passed by value`,
          this.line
        );
      }
    }
    return { out: `${out}${prefix}${name}${bracket}`, next: end + 1 };
  }

  private reportUnresolved(name: string, symbol: FortranSymbol | undefined, out: string, topLevel: boolean): void {
    if (symbol?.kind === "unknown") {
      this.ctx.diagnostics.info("unresolved-symbol", `${name} has no declaration; ${name}(...) is left as written`, this.line);
    } else if (!symbol && topLevel && !isReservedName(name) && !/::\s*$/.test(out)) {
      this.ctx.diagnostics.info("unresolved-symbol", `${name} is not declared; ${name}(...) is left as written`, this.line);
    }
  }

  private flagAmbiguous(reference: string, reason: string): void {
    this.ctx.diagnostics.report("ambiguous-subscript", `check ${reference}: ${reason}`, this.line);
    if (!this.ctx.subscriptReview.includes(reference)) this.ctx.subscriptReview.push(reference);
  }
}

/** Linearizes one piece of text outside the buffer, e.g. a statement-function body. */
export function linearizeText(text: string, ctx: UnitContext, line?: SourceLine): string {
  return new SubscriptLinearizer(ctx, line).rewrite(text);
}

export class SubscriptStage implements TranslationStage {
  readonly name = "subscripts";

  run(buffer: LineBuffer, ctx: UnitContext): void {
    for (const line of buffer) {
      if (!SCANNED_SHAPES.has(line.shape)) continue;
      line.text = new SubscriptLinearizer(ctx, line).rewrite(line.text);
    }
  }
}
