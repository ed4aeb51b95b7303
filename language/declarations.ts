// language/declarations.ts

import { deriveLine, LineBuffer } from "../core/line_buffer";
import { UnitContext } from "../core/context";
import { getMatchingParenPos, leadingWhitespace, splitTopLevelCommas } from "../core/text";
import {
  BaseType,
  C_TYPES,
  FortranSymbol,
  isBaseType,
  LineShape,
  SourceLine,
  SubroutineContext,
  SymbolKind,
} from "../types/symbols";
import { TranslationStage } from "../types/stage";
import { HEADER_PATTERN, splitLabel, UNSUPPORTED_PATTERN } from "./classify";
import { isReservedName } from "./names";

/** Indentation of generated body statements: fixed-form column 7. */
export const BODY_INDENT = "      ";

const UNKNOWN_TYPE = "unknown_type";

/** Shapes whose statements are checked for names nothing declares. */
const USE_SHAPES: ReadonlySet<LineShape> = new Set<LineShape>([
  "loop",
  "conditional",
  "goto",
  "call",
  "return",
  "assignment",
  "other",
]);

const QUOTED_LITERAL = /'(?:[^']|'')*'|"[^"]*"/g;

/** One entry of a declaration's name list, after whitespace removal. */
export interface DeclaredEntry {
  name: string;
  dimensions: string[];
  /** Character length as written (`8`, `(*)`, `(n)`), if any. */
  length?: string;
}

/**
 * parseDeclaredEntry(entry):
 *   Reads `name`, `name(d1,d2)`, `name*len` or `name(d1)*len`. Dimension
 *   lists are split at depth zero so `a(max(1,n),n)` keeps `max(1,n)`
 *   whole.
 */
export function parseDeclaredEntry(entry: string, onMismatch?: (m: string) => void): DeclaredEntry | null {
  const compact = entry.replace(/\s+/g, "");
  const nameMatch = /^\w+/.exec(compact);
  if (!nameMatch) return null;
  const name = nameMatch[0];
  let rest = compact.slice(name.length);
  let dimensions: string[] = [];

  if (rest.startsWith("(")) {
    const close = getMatchingParenPos(rest);
    if (close === -1) {
      onMismatch?.(`unclosed '(' in the declaration of ${name}`);
      return { name, dimensions };
    }
    dimensions = splitTopLevelCommas(rest.slice(1, close), onMismatch).map((d) => d.trim());
    rest = rest.slice(close + 1);
  }

  const length = rest.startsWith("*") ? rest.slice(1) : undefined;
  return { name, dimensions, length: length || undefined };
}

/**
 * characterStorage(length):
 *   Array extent reserving room for the terminator: `8` → `9`,
 *   `(n)` → `n+1`. Without a length, or with assumed length `(*)`, the
 *   name stays a plain char.
 */
export function characterStorage(length: string | undefined): string | undefined {
  if (length === undefined || length === "(*)") return undefined;
  const inner = /^\((.*)\)$/.exec(length)?.[1] ?? length;
  if (/^\d+$/.test(inner)) return String(Number(inner) + 1);
  return `${inner}+1`;
}

/**
 * parseParameterList(list):
 *   `a = 1.0e0, z = (0.0e0, 1.0e0)` → [["a", "1.0e0"], ["z", "std::complex<double>(0.0e0, 1.0e0)"]]
 */
export function parseParameterList(list: string): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  for (const item of splitTopLevelCommas(list)) {
    const eq = item.indexOf("=");
    if (eq === -1) continue;
    const name = item.slice(0, eq).trim();
    const raw = item.slice(eq + 1).trim();
    if (!/^\w+$/.test(name) || raw === "") continue;
    const complex = /^\(\s*([^(),]+?)\s*,\s*([^(),]+?)\s*\)$/.exec(raw);
    out.push([name, complex ? `std::complex<double>(${complex[1]}, ${complex[2]})` : raw]);
  }
  return out;
}

function commentOut(line: SourceLine, statement: string): SourceLine[] {
  return [deriveLine(line, `${leadingWhitespace(line.text)}// ${statement}`, "comment")];
}

function cType(base: BaseType | undefined): string {
  return base ? C_TYPES[base] : UNKNOWN_TYPE;
}

/**
 * renderParameter(symbol):
 *   How one argument reads in the unit's signature. Arrays become
 *   pointers; every other argument is passed by value.
 */
export function renderParameter(symbol: FortranSymbol | undefined, name: string): string {
  if (!symbol || symbol.kind === "unknown") return `${UNKNOWN_TYPE} ${name}`;
  if (symbol.kind === "vector" || symbol.kind === "matrix") return `${cType(symbol.baseType)} *${name}`;
  return `${cType(symbol.baseType)} ${name}`;
}

/** The rewritten header line, built from the current argument renderings. */
export function renderHeader(sub: SubroutineContext): string {
  const ret = sub.unitKind === "function" ? cType(sub.returnType) : "void";
  const params = sub.orderedArguments.map((a) => sub.argumentRenderings.get(a) ?? `${UNKNOWN_TYPE} ${a}`);
  return `${ret} ${sub.name}(${params.join(", ")}){`;
}

/**
 * InferenceStage: Type & Dimension Inference.
 *
 * Reads PARAMETER statements first, then walks the unit once: the header
 * opens the Subroutine Context, type declarations populate the symbol
 * table and are replaced by C declarations for locals, statement functions
 * are captured, and `end` closes the unit and rewrites the header.
 */
export class InferenceStage implements TranslationStage {
  readonly name = "inference";

  run(buffer: LineBuffer, ctx: UnitContext): void {
    this.collectParameters(buffer, ctx);

    let previous: SourceLine | undefined;
    buffer.rewrite((line) => {
      const result = this.inferLine(line, ctx, previous);
      if (line.shape !== "comment" && line.shape !== "blank") previous = line;
      return result;
    });

    this.reportUndeclaredNames(buffer, ctx);
    const sub = ctx.subroutine;
    if (sub) {
      if (sub.active) {
        ctx.diagnostics.report("unsupported-statement", `${sub.name} has no END statement`, sub.declarationAnchor);
        sub.active = false;
      }
      this.finalizeUnit(buffer, ctx, sub);
    }
    this.reportUntypedParameters(ctx);
  }

  private inferLine(line: SourceLine, ctx: UnitContext, previous: SourceLine | undefined): SourceLine[] | undefined {
    switch (line.shape) {
      case "header":
        return this.openUnit(line, ctx);
      case "end":
        return this.closeUnit(line, ctx, previous);
      case "declaration":
        return this.declare(line, ctx);
      case "external":
        return this.expandExternal(line, ctx);
      case "intrinsic":
        return [];
      case "implicit":
        if (/^implicit\s+none\s*$/.test(splitLabel(line.text).statement)) return [];
        ctx.diagnostics.report("unsupported-statement", "implicit typing rules are not applied", line);
        return commentOut(line, line.text.trim());
      case "assignment":
        return this.captureStatementFunction(line, ctx);
      case "return":
      case "conditional":
        if (ctx.subroutine?.unitKind === "function") {
          line.text = line.text.replace(/\breturn\b\s*$/, `return ${ctx.subroutine.name}`);
        }
        return undefined;
      case "other":
        return this.commentUnsupported(line, ctx);
      default:
        return undefined;
    }
  }

  /**
   * reportUndeclaredNames(buffer, ctx):
   *   One `unresolved-symbol` per name a statement uses without any
   *   declaration, at its first use. Names followed by "(" are reported by
   *   the Subscript Linearizer where it leaves them unrewritten.
   */
  private reportUndeclaredNames(buffer: LineBuffer, ctx: UnitContext): void {
    const reported = new Set<string>();
    for (const line of buffer) {
      if (!USE_SHAPES.has(line.shape)) continue;
      const code = splitLabel(line.text).statement.replace(QUOTED_LITERAL, "''");
      for (const match of code.matchAll(/(?<![\w.])([a-z_]\w*)\b(?!\s*\()/g)) {
        const name = match[1];
        if (reported.has(name) || ctx.symbols.has(name) || isReservedName(name)) continue;
        if (ctx.externals.has(name) || ctx.parameterValues.has(name)) continue;
        if (/\bcall\s+$/.test(code.slice(0, match.index))) continue;
        reported.add(name);
        ctx.diagnostics.report("unresolved-symbol", `${name} is used but never declared`, line);
      }
    }
  }

  /** Records every PARAMETER value and turns the statement into a comment. */
  private collectParameters(buffer: LineBuffer, ctx: UnitContext): void {
    for (const line of buffer) {
      if (line.shape !== "parameter") continue;
      const match = /^(\s*)parameter\s*\((.*)\)\s*$/.exec(line.text);
      if (!match) {
        ctx.diagnostics.report("unmatched-delimiter", "PARAMETER list is not closed", line);
        continue;
      }
      for (const [name, value] of parseParameterList(match[2])) {
        ctx.parameterValues.set(name, value);
      }
      line.text = `${match[1]}// ${line.text.trim()}`;
      line.shape = "comment";
    }
  }

  private openUnit(line: SourceLine, ctx: UnitContext): SourceLine[] | undefined {
    const { statement } = splitLabel(line.text);
    const match = HEADER_PATTERN.exec(statement);
    if (!match) return undefined;
    if (ctx.subroutine) {
      ctx.diagnostics.report("unsupported-statement", "only the first unit of a file is translated", line);
      return undefined;
    }
    const [, typeWord, unitKind, name, argText] = match;
    const args = argText
      ? splitTopLevelCommas(argText).map((a) => a.trim()).filter((a) => a.length > 0)
      : [];
    if (argText !== undefined && getMatchingParenPos(statement.slice(statement.indexOf("("))) === -1) {
      ctx.diagnostics.report(
        "unmatched-delimiter",
        `unclosed '(' in the header of ${name}; its arguments are read to the end of the line`,
        line
      );
    }
    const returnType = typeWord && isBaseType(typeWord) ? typeWord : undefined;
    const isFunction = unitKind === "function";

    ctx.subroutine = {
      name,
      unitKind: isFunction ? "function" : "subroutine",
      orderedArguments: args,
      argumentRenderings: new Map(),
      declarationAnchor: line,
      active: true,
      returnType,
      statementFunctions: new Map(),
    };
    ctx.symbols.declare({
      name,
      kind: isFunction ? "function" : "subroutine",
      baseType: returnType,
      dimensions: [],
      isArgument: false,
    });
    for (const arg of args) {
      ctx.symbols.declare({ name: arg, kind: "unknown", dimensions: [], isArgument: true });
    }
    return undefined;
  }

  /**
   * closeUnit(line, ctx, previous):
   *   `end` becomes the closing brace, preceded in a function by the
   *   return of its result unless the last statement already returns. A
   *   label on `end` moves to the first emitted line.
   */
  private closeUnit(line: SourceLine, ctx: UnitContext, previous: SourceLine | undefined): SourceLine[] {
    const { label, prefix } = splitLabel(line.text);
    const indent = label ? " ".repeat(prefix.length) : leadingWhitespace(line.text);
    const sub = ctx.subroutine;
    if (sub) sub.active = false;

    const out: SourceLine[] = [];
    if (sub && sub.unitKind === "function" && (label || previous?.shape !== "return")) {
      out.push(deriveLine(line, `${indent}return ${sub.name}`, "return"));
    }
    out.push(deriveLine(line, `${indent}}`, "other"));
    if (label) out[0].text = `${prefix}${out[0].text.trimStart()}`;
    return out;
  }

  private finalizeUnit(buffer: LineBuffer, ctx: UnitContext, sub: SubroutineContext): void {
    for (const arg of sub.orderedArguments) {
      const symbol = ctx.symbols.lookup(arg);
      if ((!symbol || symbol.kind === "unknown") && !ctx.externals.has(arg)) {
        ctx.diagnostics.report("unresolved-symbol", `argument ${arg} is never declared`, sub.declarationAnchor);
      }
      sub.argumentRenderings.set(arg, renderParameter(symbol, arg));
    }

    const anchor = sub.declarationAnchor;
    anchor.text = renderHeader(sub);
    const added = [deriveLine(anchor, `${BODY_INDENT}using namespace std`, "other")];
    if (sub.unitKind === "function") {
      const own = ctx.symbols.lookup(sub.name);
      sub.returnType = sub.returnType ?? own?.baseType;
      if (!sub.returnType) {
        ctx.diagnostics.report("unresolved-symbol", `function ${sub.name} has no declared type`, anchor);
      }
      anchor.text = renderHeader(sub);
      added.push(deriveLine(anchor, `${BODY_INDENT}${cType(sub.returnType)} ${sub.name}`, "declaration"));
    }
    buffer.insertAfter(anchor, added);
  }

  private reportUntypedParameters(ctx: UnitContext): void {
    for (const name of ctx.parameterValues.keys()) {
      if (!ctx.symbols.has(name)) {
        ctx.diagnostics.report("unresolved-symbol", `PARAMETER ${name} has no type declaration`);
      }
    }
  }

  private declare(line: SourceLine, ctx: UnitContext): SourceLine[] {
    const match = /^(\s*)(\w+)(\s*\*\s*(?:\(\*\)|\(\s*\w+\s*\)|\d+))?\s*(.*)$/.exec(line.text);
    if (!match) return [line];
    const [, indent, typeWord, typeLength, list] = match;
    const baseType = typeWord;
    if (!isBaseType(baseType)) return [line];
    const sharedLength = typeLength ? typeLength.replace(/^\s*\*\s*/, "").replace(/\s+/g, "") : undefined;
    const onMismatch = (message: string) => ctx.diagnostics.report("unmatched-delimiter", message, line);

    const out: SourceLine[] = [];
    for (const raw of splitTopLevelCommas(list, onMismatch)) {
      if (raw.trim() === "") continue;
      const entry = parseDeclaredEntry(raw, onMismatch);
      if (!entry) continue;
      if (baseType === "character" && entry.length === undefined) entry.length = sharedLength;
      const decl = this.recordSymbol(entry, baseType, line, ctx);
      if (decl) {
        out.push({ text: `${indent}${decl}`, shape: "declaration", origin: line.origin, declares: entry.name });
      }
    }
    return out;
  }

  /**
   * recordSymbol(entry, baseType, line, ctx):
   *   Classifies one declared name and returns the C declaration a local
   *   needs, or null for arguments and the unit's own function name.
   */
  private recordSymbol(entry: DeclaredEntry, baseType: BaseType, line: SourceLine, ctx: UnitContext): string | null {
    const { name, dimensions } = entry;
    let kind: SymbolKind = "scalar";
    if (dimensions.length === 1) kind = "vector";
    else if (dimensions.length === 2) kind = "matrix";
    else if (dimensions.length > 2) {
      ctx.diagnostics.report(
        "unsupported-statement",
        `${name} has rank ${dimensions.length}; only vectors and matrices are linearized`,
        line
      );
      kind = "unknown";
    }

    const constantValue = kind === "scalar" ? ctx.parameterValues.get(name) : undefined;
    if (constantValue !== undefined) kind = "parameter";
    const charLength = baseType === "character" && kind !== "unknown" ? characterStorage(entry.length) : undefined;

    const existing = ctx.symbols.lookup(name);
    if (existing) {
      if (existing.kind === "function" && ctx.subroutine?.name === name) {
        existing.baseType = baseType;
        return null;
      }
      if (!ctx.symbols.classify(name, kind, baseType, dimensions)) {
        ctx.diagnostics.report("redeclared-symbol", `${name} is declared more than once; the first declaration is kept`, line);
        return null;
      }
      if (charLength !== undefined && kind !== "scalar") this.reportDroppedLength(name, charLength, line, ctx);
      return null;
    }

    ctx.symbols.declare({
      name,
      kind,
      baseType,
      dimensions,
      isArgument: false,
      constantValue,
      charLength,
    });
    return this.localDeclaration(name, kind, baseType, dimensions, constantValue, charLength, line, ctx);
  }

  private localDeclaration(
    name: string,
    kind: SymbolKind,
    baseType: BaseType,
    dimensions: string[],
    constantValue: string | undefined,
    charLength: string | undefined,
    line: SourceLine,
    ctx: UnitContext
  ): string {
    const type = C_TYPES[baseType];
    if (kind === "parameter") return `const ${type} ${name} = ${constantValue}`;
    if (kind === "vector" || kind === "matrix") {
      if (dimensions.every((d) => /^\d+$/.test(d))) {
        const size = dimensions.reduce((acc, d) => acc * Number(d), 1);
        // Character elements keep their length as a second extent.
        return charLength === undefined ? `${type} ${name}[${size}]` : `${type} ${name}[${size}][${charLength}]`;
      }
      ctx.diagnostics.info(
        "dynamic-array",
        `${name}(${dimensions.join(",")}) has non-literal dimensions; allocate it by hand`,
        line
      );
      if (charLength !== undefined) this.reportDroppedLength(name, charLength, line, ctx);
      return `${type} *${name}`;
    }
    if (charLength !== undefined) return `${type} ${name}[${charLength}]`;
    return `${type} ${name}`;
  }

  private reportDroppedLength(name: string, charLength: string, line: SourceLine, ctx: UnitContext): void {
    ctx.diagnostics.report(
      "character-length",
      `${name} is a char pointer; the length of its elements (${charLength} with the terminator) is dropped`,
      line
    );
  }

  private expandExternal(line: SourceLine, ctx: UnitContext): SourceLine[] {
    const match = /^(\s*)external\s+(.*)$/.exec(line.text);
    if (!match) return [line];
    const names = splitTopLevelCommas(match[2]).map((n) => n.trim()).filter((n) => /^\w+$/.test(n));
    return names.map((name) => {
      ctx.externals.add(name);
      return { text: `${match[1]}extern ${name}`, shape: "external", origin: line.origin };
    });
  }

  /**
   * captureStatementFunction(line, ctx):
   *   `name(params) = body` where `name` is a callable scalar is a
   *   statement function: it is recorded and the line is commented out.
   */
  private captureStatementFunction(line: SourceLine, ctx: UnitContext): SourceLine[] | undefined {
    const sub = ctx.subroutine;
    const match = /^(\s*)(\w+)\s*\(/.exec(line.text);
    if (!sub || !match || !ctx.symbols.isCallable(match[2])) return undefined;
    const open = match[0].length - 1;
    const close = getMatchingParenPos(line.text.slice(open));
    if (close === -1) return undefined;
    const after = line.text.slice(open + close + 1);
    const eq = /^\s*=(?!=)/.exec(after);
    if (!eq) return undefined;

    const name = match[2];
    const params = splitTopLevelCommas(line.text.slice(open + 1, open + close)).map((p) => p.trim());
    const body = after.slice(eq[0].length).trim();
    sub.statementFunctions.set(name, { name, params, body });
    return commentOut(line, line.text.trim());
  }

  private commentUnsupported(line: SourceLine, ctx: UnitContext): SourceLine[] | undefined {
    const { statement } = splitLabel(line.text);
    const match = UNSUPPORTED_PATTERN.exec(statement);
    if (!match) return undefined;
    ctx.diagnostics.report("unsupported-statement", `${match[1].toUpperCase()} statement is not translated`, line);
    return commentOut(line, line.text.trim());
  }
}
