import { describe, it, expect } from "vitest";
import { createUnitContext, UnitContext } from "../core/context";
import { LineBuffer } from "../core/line_buffer";
import { runStages, translateSource } from "../core/pipeline";
import { getStages } from "../language";
import { inferArgumentType, toDoubleQuotes } from "../language/calls";
import { readSource } from "../language/source_reader";

function resolveCalls(lines: string[]): { buffer: LineBuffer; ctx: UnitContext } {
  const ctx = createUnitContext();
  const buffer = readSource(lines.join("\n"));
  runStages(buffer, ctx, getStages("calls"));
  return { buffer, ctx };
}

function unitLines(lines: string[]): string[] {
  return translateSource(lines.join("\n"), { emitPreamble: false }).text.split("\n");
}

describe("toDoubleQuotes", () => {
  it("unescapes doubled quotes", () => {
    expect(toDoubleQuotes("f('it''s', 'a')")).toBe(`f("it's", "a")`);
  });

  it("escapes embedded double quotes", () => {
    expect(toDoubleQuotes(`'say "hi"'`)).toBe(`"say \\"hi\\""`);
  });
});

describe("inferArgumentType", () => {
  const ctx = createUnitContext();
  ctx.symbols.declare({ name: "x", kind: "vector", dimensions: ["n"], isArgument: true, baseType: "doubleprecision" });
  ctx.symbols.declare({ name: "n", kind: "scalar", dimensions: [], isArgument: true, baseType: "integer" });
  ctx.symbols.declare({ name: "s", kind: "scalar", dimensions: [], isArgument: false, baseType: "character" });

  it("types literals directly", () => {
    expect(inferArgumentType(`"abc"`, ctx)).toBe("const char *");
    expect(inferArgumentType("1", ctx)).toBe("size_t");
    expect(inferArgumentType("false", ctx)).toBe("bool");
  });

  it("passes whole arrays and addressed elements as pointers", () => {
    expect(inferArgumentType("x", ctx)).toBe("double *");
    expect(inferArgumentType("&x[i-1]", ctx)).toBe("double *");
  });

  it("passes subscripted elements and scalars by value", () => {
    expect(inferArgumentType("x[i-1]", ctx)).toBe("double");
    expect(inferArgumentType("n+1", ctx)).toBe("int");
  });

  it("treats character names as strings", () => {
    expect(inferArgumentType("s", ctx)).toBe("const char *");
  });

  it("falls back to unknown_type", () => {
    expect(inferArgumentType("q", ctx)).toBe("unknown_type");
    expect(inferArgumentType("&q", ctx)).toBe("unknown_type *");
  });
});

describe("CallStage", () => {
  it("declares external procedures from their first call", () => {
    const { buffer, ctx } = resolveCalls([
      "      subroutine msg(n)",
      "      integer n",
      "      double precision dnrm2, r",
      "      character*4 s",
      "      external dnrm2",
      "      call report('it''s', n, .true.)",
      "      r = dnrm2(n, r)",
      "      end",
    ]);
    expect(buffer.texts()).toEqual([
      "void msg(int n){",
      "      using namespace std",
      "      double r",
      "      char s[5]",
      `      report("it's", n, true)`,
      "      r = dnrm2(n, r)",
      "      }",
    ]);
    expect(ctx.declarations).toEqual(["void report(const char *, int, bool);", "double dnrm2(int, double);"]);
    expect(ctx.symbols.kindOf("report")).toBe("subroutine");
    expect(ctx.symbols.kindOf("dnrm2")).toBe("function");
  });

  it("turns a procedure argument into a function pointer parameter", () => {
    const lines = unitLines([
      "      subroutine drive(f, x, n)",
      "      external f",
      "      double precision x(n)",
      "      integer n",
      "      call f(x, n)",
      "      end",
    ]);
    expect(lines.slice(0, 4)).toEqual([
      "void drive(void (*f)(double *, int), double *x, int n){",
      "      using namespace std;",
      "      f(x, n);",
      "      }",
    ]);
    expect(lines[4]).toBe("");
    expect(lines[5]).toBe("// Declarations need repairing; reference/pointers need to be replaced.");
  });

  it("inlines a statement function with the argument types of its first use", () => {
    const lines = unitLines([
      "      subroutine s(y)",
      "      integer f, x",
      "      double precision y",
      "      f(x) = x*x + 1",
      "      y = f(3)",
      "      end",
    ]);
    expect(lines).toEqual([
      "void s(double y){",
      "      using namespace std;",
      "      int x;",
      "      // f(x) = x*x + 1",
      "      y = f(3);",
      "      }",
      "",
      "static inline int f(size_t x){ return x*x + 1; }",
      "",
      "// Declarations need repairing; reference/pointers need to be replaced.",
      "// Detected the following indicial variables:",
      "",
    ]);
  });

  it("reports a statement function called with the wrong number of arguments", () => {
    const result = translateSource(
      [
        "      subroutine sf(y)",
        "      double precision y, h, t",
        "      h(t) = t + 1.0d0",
        "      y = h(y, 2)",
        "      end",
      ].join("\n"),
      { emitPreamble: false }
    );
    const lines = result.text.split("\n");
    const call = lines.indexOf("      y = h(y, 2);");
    expect(call).toBeGreaterThan(0);
    expect(lines[call - 1]).toBe("      // f77cpp: Argument number mismatch in call to h: 1 declared, 2 passed");
    expect(result.diagnostics.filter((d) => d.code === "arity-mismatch")).toHaveLength(1);
  });
});
