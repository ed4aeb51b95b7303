// core/context.ts

import { BaseType, FortranSymbol, SubroutineContext, SymbolKind } from "../types/symbols";
import { DiagnosticsSink } from "./diagnostics";
import { resolveOptions, TranslatorOptions } from "./config";

/**
 * SymbolTable: identifier → FortranSymbol for the active unit only.
 * Names are stored lowercase; the first declaration of a name fixes its
 * kind and dimensions.
 */
export class SymbolTable {
  private readonly symbols = new Map<string, FortranSymbol>();

  /** Adds `symbol` unless the name is taken. Returns whether it was added. */
  declare(symbol: FortranSymbol): boolean {
    const name = symbol.name.toLowerCase();
    if (this.symbols.has(name)) return false;
    this.symbols.set(name, { ...symbol, name });
    return true;
  }

  lookup(name: string): FortranSymbol | undefined {
    return this.symbols.get(name.toLowerCase());
  }

  kindOf(name: string): SymbolKind | undefined {
    return this.lookup(name)?.kind;
  }

  has(name: string): boolean {
    return this.symbols.has(name.toLowerCase());
  }

  isArray(name: string): boolean {
    const kind = this.kindOf(name);
    return kind === "vector" || kind === "matrix";
  }

  /**
   * A function-like reference: a non-character scalar followed by "(".
   * Character scalars are excluded because `s(1:3)` is a substring.
   */
  isCallable(name: string): boolean {
    const symbol = this.lookup(name);
    return symbol !== undefined && symbol.kind === "scalar" && symbol.baseType !== "character";
  }

  /**
   * classify(name, kind, baseType, dimensions):
   *   Resolves a symbol that is still "unknown" (an argument seen in the
   *   header). Returns false when the name was already classified.
   */
  classify(name: string, kind: SymbolKind, baseType: BaseType | undefined, dimensions: string[]): boolean {
    const symbol = this.lookup(name);
    if (!symbol || symbol.kind !== "unknown") return false;
    symbol.kind = kind;
    symbol.baseType = baseType;
    symbol.dimensions = dimensions;
    return true;
  }

  entries(): FortranSymbol[] {
    return Array.from(this.symbols.values());
  }
}

/**
 * UnitContext: all state of one translation unit. Every stage receives the
 * same instance; a new unit always starts from a fresh one.
 */
export class UnitContext {
  readonly symbols = new SymbolTable();
  readonly diagnostics = new DiagnosticsSink();
  /** PARAMETER name → value text, filled before declarations are read. */
  readonly parameterValues = new Map<string, string>();
  /** Forward declarations and inline functions, in resolution order. */
  readonly declarations: string[] = [];
  /** References whose subscript split needs a human look. */
  readonly subscriptReview: string[] = [];
  /** Names listed in EXTERNAL statements. */
  readonly externals = new Set<string>();
  subroutine: SubroutineContext | null = null;

  constructor(readonly options: TranslatorOptions) {}

  /** Name used for generated labels; "unit" until a header is seen. */
  get unitName(): string {
    return this.subroutine?.name ?? "unit";
  }
}

export function createUnitContext(options?: Partial<TranslatorOptions>): UnitContext {
  return new UnitContext(resolveOptions(options));
}
