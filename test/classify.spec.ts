import { describe, it, expect } from "vitest";
import { classifyText, splitLabel } from "../language/classify";

describe("classifyText", () => {
  it.each([
    ["      subroutine foo(a, b)", "header"],
    ["      doubleprecision function f(x)", "header"],
    ["      integer i, j", "declaration"],
    ["      parameter (n = 5)", "parameter"],
    ["      external f", "external"],
    ["      intrinsic abs", "intrinsic"],
    ["      implicit none", "implicit"],
    ["      do 10 i = 1, n", "loop"],
    ["      do while (i  <  n)", "loop"],
    ["      enddo", "loopEnd"],
    ["      end do", "loopEnd"],
    ["      if (x) then", "conditional"],
    ["      else", "conditional"],
    ["      end if", "conditional"],
    ["      go to 20", "goto"],
    ["      call foo(a)", "call"],
    ["      return", "return"],
    ["      x(i) = 1", "assignment"],
    ["      end", "end"],
    ["      write(*,*) x", "other"],
    ["", "blank"],
  ])("%s → %s", (text, shape) => {
    expect(classifyText(text).shape).toBe(shape);
  });

  it("reads the label field", () => {
    expect(classifyText("   10 continue")).toEqual({ shape: "loopEnd", label: "10" });
  });
});

describe("splitLabel", () => {
  it("splits a label that fits in columns 1-5", () => {
    expect(splitLabel("  100 x = 1")).toEqual({ label: "100", statement: "x = 1", prefix: "  100 " });
  });

  it("leaves digits outside the label field alone", () => {
    expect(splitLabel("       10 x")).toEqual({ statement: "10 x", prefix: "" });
  });
});
