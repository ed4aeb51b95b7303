// types/symbols.ts

/**
 * SymbolKind: how an identifier is used inside the active unit.
 * "unknown" is the state of an argument (or reference) that no declaration
 * has classified yet; stages leave such names unrewritten.
 */
export type SymbolKind =
  | "scalar"
  | "vector"
  | "matrix"
  | "parameter"
  | "subroutine"
  | "function"
  | "unknown";

/** Fortran base types recognized in declarations, after type-name collapsing. */
export type BaseType =
  | "logical"
  | "character"
  | "integer"
  | "ftnlen"
  | "doubleprecision"
  | "doublecomplex";

export const BASE_TYPES: readonly BaseType[] = [
  "logical",
  "character",
  "integer",
  "ftnlen",
  "doubleprecision",
  "doublecomplex",
];

/** One-to-one mapping of Fortran base types onto C++ types. */
export const C_TYPES: Record<BaseType, string> = {
  logical: "bool",
  character: "char",
  integer: "int",
  ftnlen: "size_t",
  doubleprecision: "double",
  doublecomplex: "std::complex<double>",
};

export function isBaseType(word: string): word is BaseType {
  return BASE_TYPES.some((b) => b === word);
}

/**
 * FortranSymbol: one record per identifier of the active unit.
 *
 * `dimensions` holds one (vector) or two (matrix) dimension expressions as
 * written in the declaration. `charLength` is only set for CHARACTER names
 * declared with a length (the element length for arrays), already
 * including the terminator slot.
 */
export interface FortranSymbol {
  name: string;
  kind: SymbolKind;
  baseType?: BaseType;
  dimensions: string[];
  isArgument: boolean;
  constantValue?: string;
  charLength?: string;
}

/** A `name(params) = body` definition captured during inference. */
export interface StatementFunction {
  name: string;
  params: string[];
  body: string;
}

export interface SubroutineContext {
  name: string;
  unitKind: "subroutine" | "function";
  orderedArguments: string[];
  /** Rendered parameter text per argument name, filled when the unit ends. */
  argumentRenderings: Map<string, string>;
  /** The header record; rewritten in place once the symbol table is complete. */
  declarationAnchor: SourceLine;
  active: boolean;
  returnType?: BaseType;
  statementFunctions: Map<string, StatementFunction>;
}

/** Syntactic shape of a logical line, assigned once by the classifier. */
export type LineShape =
  | "blank"
  | "comment"
  | "header"
  | "end"
  | "declaration"
  | "parameter"
  | "external"
  | "intrinsic"
  | "implicit"
  | "loop"
  | "loopEnd"
  | "conditional"
  | "goto"
  | "call"
  | "return"
  | "assignment"
  | "label"
  | "other";

/**
 * SourceLine: a mutable record of the Line Buffer.
 * `origin` is the 1-based physical line it was read from.
 */
export interface SourceLine {
  text: string;
  shape: LineShape;
  origin: number;
  label?: string;
  trailingComment?: string;
  /** Name of the local variable this line declares, for later removal. */
  declares?: string;
}

export type Severity = "warning" | "info";

export type DiagnosticCode =
  | "unmatched-delimiter"
  | "unresolved-symbol"
  | "arity-mismatch"
  | "ambiguous-subscript"
  | "computed-reference"
  | "dynamic-array"
  | "unsupported-statement"
  | "loop-form"
  | "redeclared-symbol"
  | "leading-dimension"
  | "character-length";

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  /** The record the note is rendered above; unit-level notes have none. */
  line?: SourceLine;
}
