// language/control_flow.ts

import { deriveLine, LineBuffer } from "../core/line_buffer";
import { UnitContext } from "../core/context";
import { getMatchingParenPos, leadingWhitespace, splitTopLevelCommas } from "../core/text";
import { LineShape, SourceLine } from "../types/symbols";
import { TranslationStage } from "../types/stage";
import { splitLabel } from "./classify";

/** Shapes the restructurer rewrites; everything else only gets its label converted. */
const CONTROL_SHAPES: ReadonlySet<LineShape> = new Set<LineShape>(["loop", "loopEnd", "conditional", "goto"]);

const DO_PATTERN = /^do\s+(?:(\d+)\s*,?\s*)?(\w+)\s*=\s*(.*)$/;
const DO_WHILE_PATTERN = /^do\s*(?:(\d+)\s*,?\s*)?while\s*\(/;
const LITERAL_STEP = /^[-+]?\s*\d+$/;

export function labelName(unit: string, label: string): string {
  return `${unit}_L${label}`;
}

/**
 * rewriteGotos(text, unit):
 *   `go to 10` / `goto 10` → `goto unit_L10`, anywhere on the line.
 */
export function rewriteGotos(text: string, unit: string): string {
  return text.replace(/\bgo\s*to\s*(\d+)\b/g, (_m: string, label: string) => `goto ${labelName(unit, label)}`);
}

/**
 * renderCountedLoop(variable, bounds):
 *   Builds the `for` header of a counted DO loop, or null when the bound
 *   list is not `start, stop` or `start, stop, step`.
 */
export function renderCountedLoop(variable: string, bounds: string[]): string | null {
  const [start, stop, step] = bounds.map((b) => b.trim());
  if (bounds.length === 2) {
    return `for(${variable} = ${start}; ${variable} <= ${stop}; ++${variable}){`;
  }
  if (bounds.length !== 3) return null;
  if (LITERAL_STEP.test(step)) {
    const value = Number(step.replace(/\s+/g, ""));
    if (value < 0) {
      return `for(${variable} = ${start}; ${variable} >= ${stop}; ${variable} -= ${Math.abs(value)}){`;
    }
    return `for(${variable} = ${start}; ${variable} <= ${stop}; ${variable} += ${value}){`;
  }
  return (
    `for(${variable} = ${start}; ((${step} < 0) ? (${variable} >= ${stop}) : (${variable} <= ${stop})); ` +
    `${variable} += ${step}){`
  );
}

interface OpenLoop {
  line: SourceLine;
  indent: string;
}

/**
 * ControlFlowStage: labels, DO loops, block IF and GO TO.
 *
 * Statement labels become `unit_LNNN:` lines of their own. A labeled
 * statement that ends one or more `do NNN` loops is followed by one
 * closing brace per loop; a labeled `continue` turns into those braces.
 */
export class ControlFlowStage implements TranslationStage {
  readonly name = "control-flow";

  run(buffer: LineBuffer, ctx: UnitContext): void {
    const open = new Map<string, OpenLoop[]>();
    const unit = ctx.unitName;

    buffer.rewrite((line) => {
      if (line.shape === "comment" || line.shape === "blank" || line.shape === "label") return undefined;

      const { label, statement, prefix } = splitLabel(line.text);
      const indent = label ? " ".repeat(prefix.length) : leadingWhitespace(line.text);

      if (line.shape === "loop") {
        const target = DO_PATTERN.exec(statement)?.[1] ?? DO_WHILE_PATTERN.exec(statement)?.[1];
        if (target) {
          const loops = open.get(target) ?? [];
          loops.push({ line, indent });
          open.set(target, loops);
        }
      }

      let closing: OpenLoop[] = [];
      if (label) {
        closing = (open.get(label) ?? []).reverse();
        open.delete(label);
      }

      const restructured = CONTROL_SHAPES.has(line.shape)
        ? this.restructure(statement, line, ctx)
        : rewriteGotos(statement, unit);

      if (!label) {
        line.text = restructured === null ? `${indent}// ${statement}` : `${indent}${restructured}`;
        if (restructured === null) line.shape = "comment";
        return undefined;
      }

      delete line.label;
      const labelText = `${labelName(unit, label)}: `;
      const braces = closing.map((loop) => deriveLine(line, `${loop.indent}}`, "loopEnd"));
      const terminal = /^continue$/.test(statement);

      if (terminal) {
        // A bare labeled continue keeps only its label; otherwise it is the first brace.
        if (braces.length === 0) {
          line.text = labelText;
          line.shape = "label";
          return undefined;
        }
        line.text = braces[0].text;
        line.shape = "loopEnd";
        return [deriveLine(line, labelText, "label"), line, ...braces.slice(1)];
      }

      line.text = restructured === null ? `${indent}// ${statement}` : `${indent}${restructured}`;
      if (restructured === null) line.shape = "comment";
      return [deriveLine(line, labelText, "label"), line, ...braces];
    });

    for (const [label, loops] of open) {
      for (const loop of loops) {
        ctx.diagnostics.report(
          "loop-form",
          `label ${label} ending this loop never appears; its block is not closed`,
          loop.line
        );
      }
    }
  }

  /**
   * restructure(statement, line, ctx):
   *   The C form of one control statement (label already split off), or
   *   null when the statement is commented out.
   */
  private restructure(statement: string, line: SourceLine, ctx: UnitContext): string | null {
    const unit = ctx.unitName;
    switch (line.shape) {
      case "loop":
        return this.loop(statement, line, ctx);
      case "loopEnd":
        return "}";
      case "conditional":
        return this.conditional(statement, line, ctx);
      case "goto":
        if (/^go\s*to\s*\(/.test(statement)) {
          ctx.diagnostics.report("unsupported-statement", "computed GO TO is not translated", line);
          return null;
        }
        if (!/^go\s*to\s*\d+\s*$/.test(statement)) {
          ctx.diagnostics.report("unsupported-statement", "assigned GO TO is not translated", line);
          return null;
        }
        return rewriteGotos(statement, unit);
      default:
        return statement;
    }
  }

  private loop(statement: string, line: SourceLine, ctx: UnitContext): string {
    const whileHead = DO_WHILE_PATTERN.exec(statement);
    if (whileHead) {
      const rest = statement.slice(whileHead[0].length - 1);
      const close = getMatchingParenPos(rest);
      if (close === -1) {
        ctx.diagnostics.report("unmatched-delimiter", "unclosed '(' in the DO WHILE condition", line);
        return statement;
      }
      return `while${rest.slice(0, close + 1)}{`;
    }

    const counted = DO_PATTERN.exec(statement);
    if (!counted) {
      ctx.diagnostics.report("loop-form", "DO statement is not a counted or DO WHILE loop; left as written", line);
      return statement;
    }
    const [, , variable, rest] = counted;
    const bounds = splitTopLevelCommas(rest, (m) =>
      ctx.diagnostics.report("unmatched-delimiter", `${m} in the bounds of the DO loop over ${variable}`, line)
    );
    const header = renderCountedLoop(variable, bounds);
    if (header === null) {
      ctx.diagnostics.report("loop-form", `DO loop over ${variable} has ${bounds.length} bounds; left as written`, line);
      return statement;
    }
    return header;
  }

  private conditional(statement: string, line: SourceLine, ctx: UnitContext): string | null {
    if (/^end\s*if$/.test(statement)) return "}";
    if (/^(?:\}\s*)?else$/.test(statement)) return "}else{";

    const elseIf = /^(?:else\s*if|elseif)\s*(?=\()/.exec(statement);
    const head = elseIf ? statement.slice(elseIf[0].length) : statement.replace(/^if\s*/, "");
    const close = getMatchingParenPos(head);
    if (close === -1) {
      ctx.diagnostics.report("unmatched-delimiter", "unclosed '(' in the IF condition", line);
      return statement;
    }
    const condition = head.slice(1, close);
    const rest = head.slice(close + 1).trim();

    if (rest === "then") return elseIf ? `}else if(${condition}){` : `if(${condition}){`;
    if (/^\d+\s*,\s*\d+\s*,\s*\d+$/.test(rest)) {
      ctx.diagnostics.report("unsupported-statement", "arithmetic IF is not translated", line);
      return null;
    }
    if (elseIf) {
      ctx.diagnostics.report("loop-form", "ELSE IF without THEN; left as written", line);
      return statement;
    }
    return `if(${condition}) ${rewriteGotos(rest, ctx.unitName)}`;
  }
}
