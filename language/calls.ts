// language/calls.ts

import { LineBuffer } from "../core/line_buffer";
import { UnitContext } from "../core/context";
import { getMatchingParenPos, splitTopLevelCommas } from "../core/text";
import { C_TYPES, LineShape, SourceLine, StatementFunction } from "../types/symbols";
import { TranslationStage } from "../types/stage";
import { renderHeader } from "./declarations";
import { replaceIntrinsics } from "./intrinsics";
import { linearizeText } from "./subscripts";

const UNKNOWN_TYPE = "unknown_type";

/** Shapes that may hold a CALL statement or a function reference. */
const CODE_SHAPES: ReadonlySet<LineShape> = new Set<LineShape>([
  "loop",
  "conditional",
  "call",
  "return",
  "assignment",
  "other",
]);

/** One call site: the arguments as written, and the line they were found on. */
export interface CallSite {
  name: string;
  args: string[];
  line: SourceLine;
}

/**
 * toDoubleQuotes(text):
 *   'it''s' → "it's". Double quotes inside the literal are escaped.
 */
export function toDoubleQuotes(text: string): string {
  return text.replace(/'((?:[^']|'')*)'/g, (_m: string, inner: string) => {
    const body = inner.replace(/''/g, "'").replace(/"/g, '\\"');
    return `"${body}"`;
  });
}

function splitArguments(argText: string): string[] {
  if (argText.trim() === "") return [];
  return splitTopLevelCommas(argText).map((a) => a.trim());
}

/**
 * inferArgumentType(arg, ctx):
 *   The C parameter type an actual argument suggests. Literals decide
 *   directly; otherwise the first symbol found in the argument does.
 */
export function inferArgumentType(arg: string, ctx: UnitContext): string {
  const text = arg.trim();
  if (/^".*"$/.test(text)) return "const char *";
  if (/^\d+$/.test(text)) return "size_t";
  if (/^(?:true|false)$/.test(text)) return "bool";

  const addressed = text.startsWith("&");
  const words = /(\w+)(\s*\[)?/g;
  let match: RegExpExecArray | null;
  while ((match = words.exec(text)) !== null) {
    const [, word, subscript] = match;
    if (/^\d/.test(word)) continue;
    const symbol = ctx.symbols.lookup(word);
    if (!symbol || !symbol.baseType) continue;
    if (symbol.baseType === "character") return "const char *";
    const type = C_TYPES[symbol.baseType];
    const isArray = symbol.kind === "vector" || symbol.kind === "matrix";
    if (addressed || (isArray && !subscript)) return `${type} *`;
    return type;
  }
  return addressed ? `${UNKNOWN_TYPE} *` : UNKNOWN_TYPE;
}

function withName(type: string, name: string): string {
  return type.endsWith("*") ? `${type}${name}` : `${type} ${name}`;
}

/**
 * CallStage: Call & Prototype Resolver.
 *
 * Collects CALL statements and references to scalar-typed names followed
 * by "(", then resolves each name once from its first call site: a
 * procedure argument becomes a function-pointer parameter of the unit, a
 * statement function becomes an inline definition, anything else gets a
 * forward declaration.
 */
export class CallStage implements TranslationStage {
  readonly name = "calls";

  run(buffer: LineBuffer, ctx: UnitContext): void {
    const subroutines = new Map<string, CallSite>();
    const functions = new Map<string, CallSite>();

    for (const line of buffer) {
      if (!CODE_SHAPES.has(line.shape)) continue;
      const call = this.rewriteCall(line);
      if (call && !subroutines.has(call.name)) subroutines.set(call.name, call);
      const references = this.functionReferences(line, ctx);
      for (const site of references) {
        if (!functions.has(site.name)) functions.set(site.name, site);
      }
      if (call || references.length > 0) line.text = toDoubleQuotes(line.text);
    }

    const resolved = new Set<string>();
    for (const site of subroutines.values()) {
      if (resolved.has(site.name)) continue;
      resolved.add(site.name);
      this.resolve(site, "void", buffer, ctx);
    }
    for (const site of functions.values()) {
      if (resolved.has(site.name)) continue;
      resolved.add(site.name);
      const symbol = ctx.symbols.lookup(site.name);
      const returnType = symbol?.baseType ? C_TYPES[symbol.baseType] : UNKNOWN_TYPE;
      this.resolve(site, returnType, buffer, ctx);
      buffer.remove((l) => l.shape === "declaration" && l.declares === site.name);
    }
    this.markProcedures(subroutines, functions, ctx);
  }

  /** Drops the CALL keyword; returns the call site it names, if any. */
  private rewriteCall(line: SourceLine): CallSite | null {
    const match = /\bcall\s+(\w+)\s*/.exec(line.text);
    if (!match) return null;
    const name = match[1];
    const before = line.text.slice(0, match.index);
    const after = line.text.slice(match.index + match[0].length);

    if (!after.startsWith("(")) {
      line.text = `${before}${name}()${after}`;
      return { name, args: [], line };
    }
    line.text = `${before}${name}${after}`;
    const close = getMatchingParenPos(after);
    const argText = close === -1 ? after.slice(1) : after.slice(1, close);
    return { name, args: splitArguments(toDoubleQuotes(argText)), line };
  }

  private functionReferences(line: SourceLine, ctx: UnitContext): CallSite[] {
    const sites: CallSite[] = [];
    const pattern = /\b(\w+)\s*\(/g;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(line.text)) !== null) {
      const name = match[1];
      if (!ctx.symbols.isCallable(name)) continue;
      const open = match.index + match[0].length - 1;
      const rest = line.text.slice(open);
      const close = getMatchingParenPos(rest);
      const argText = close === -1 ? rest.slice(1) : rest.slice(1, close);
      sites.push({ name, args: splitArguments(toDoubleQuotes(argText)), line });
    }
    return sites;
  }

  private resolve(site: CallSite, returnType: string, buffer: LineBuffer, ctx: UnitContext): void {
    const types = site.args.map((a) => inferArgumentType(a, ctx));
    const sub = ctx.subroutine;

    if (sub && sub.orderedArguments.includes(site.name)) {
      sub.argumentRenderings.set(site.name, `${returnType} (*${site.name})(${types.join(", ")})`);
      sub.declarationAnchor.text = renderHeader(sub);
    } else {
      const statementFunction = sub?.statementFunctions.get(site.name);
      if (statementFunction) {
        this.inlineStatementFunction(statementFunction, types, returnType, site, ctx);
      } else {
        ctx.declarations.push(`${returnType} ${site.name}(${types.join(", ")});`);
      }
    }

    buffer.remove((l) => l.shape === "external" && new RegExp(`^\\s*extern\\s+${site.name}\\s*$`).test(l.text));
  }

  private inlineStatementFunction(
    fn: StatementFunction,
    types: string[],
    returnType: string,
    site: CallSite,
    ctx: UnitContext
  ): void {
    if (types.length !== fn.params.length) {
      ctx.diagnostics.report(
        "arity-mismatch",
        `Argument number mismatch in call to ${fn.name}: ${fn.params.length} declared, ${types.length} passed`,
        site.line
      );
      return;
    }
    const params = fn.params.map((p, i) => withName(types[i], p));
    const body = replaceIntrinsics(linearizeText(fn.body, ctx));
    ctx.declarations.push(`static inline ${returnType} ${fn.name}(${params.join(", ")}){ return ${body}; }`);
  }

  /** Resolved names stop being plain scalars once their calls are known. */
  private markProcedures(
    subroutines: Map<string, CallSite>,
    functions: Map<string, CallSite>,
    ctx: UnitContext
  ): void {
    for (const name of subroutines.keys()) {
      const symbol = ctx.symbols.lookup(name);
      if (!symbol) {
        ctx.symbols.declare({ name, kind: "subroutine", dimensions: [], isArgument: false });
      } else if (symbol.kind === "unknown") {
        ctx.symbols.classify(name, "subroutine", undefined, []);
      }
    }
    for (const name of functions.keys()) {
      const symbol = ctx.symbols.lookup(name);
      if (symbol) symbol.kind = "function";
    }
  }
}
