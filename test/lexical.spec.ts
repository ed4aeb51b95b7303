import { describe, it, expect } from "vitest";
import { LineBuffer } from "../core/line_buffer";
import { createUnitContext } from "../core/context";
import {
  collapseTypeNames,
  fixNumericConstants,
  foldCase,
  LexicalStage,
  replaceComparisonOps,
  replaceExponent,
} from "../language/lexical";

describe("lexical substitutions", () => {
  it("folds case outside literals", () => {
    expect(foldCase("      X = 'ABC'")).toBe("      x = 'ABC'");
  });

  it("collapses type names", () => {
    expect(collapseTypeNames("double precision a")).toBe("doubleprecision a");
    expect(collapseTypeNames("complex*16 z")).toBe("doublecomplex z");
    expect(collapseTypeNames("real*8 r")).toBe("doubleprecision r");
  });

  it("replaces dotted operators but not inside literals", () => {
    expect(replaceComparisonOps("a .le. b")).toBe("a  <=  b");
    expect(replaceComparisonOps("x = .true.")).toBe("x = true");
    expect(replaceComparisonOps("'a.gt.b' .gt. c")).toBe("'a.gt.b'  >  c");
  });

  it("rewrites d exponents", () => {
    expect(fixNumericConstants("x = 1.0d0 + 2d-3 + a2d3")).toBe("x = 1.0e0 + 2e-3 + a2d3");
  });
});

describe("replaceExponent", () => {
  it("handles words, groups and calls", () => {
    expect(replaceExponent("y = x**2")).toBe("y = pow(x, 2)");
    expect(replaceExponent("y = (a+b)**(n-1)")).toBe("y = pow(a+b, n-1)");
    expect(replaceExponent("y = f(x)**2")).toBe("y = pow(f(x), 2)");
    expect(replaceExponent("y = x**-1")).toBe("y = pow(x, -1)");
  });

  it("returns null when an operand cannot be delimited", () => {
    expect(replaceExponent("y = )**2")).toBeNull();
  });
});

describe("LexicalStage", () => {
  it("applies every substitution to code lines only", () => {
    const buffer = LineBuffer.fromTexts(["      IF (A .GT. 0.5D0) X = Y**2", "C KEEP .GT."]);
    const comment = buffer.at(1);
    if (comment) comment.shape = "comment";
    new LexicalStage().run(buffer, createUnitContext());
    expect(buffer.texts()).toEqual(["      if (a  >  0.5e0) x = pow(y, 2)", "C KEEP .GT."]);
  });

  it("reports an undelimited exponent and keeps the line", () => {
    const buffer = LineBuffer.fromTexts(["      y = )**2"]);
    const ctx = createUnitContext();
    new LexicalStage().run(buffer, ctx);
    expect(buffer.texts()).toEqual(["      y = )**2"]);
    expect(ctx.diagnostics.byCode("unmatched-delimiter")).toHaveLength(1);
  });
});
