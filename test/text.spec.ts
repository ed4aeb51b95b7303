import { describe, it, expect } from "vitest";
import {
  getMatchingParenPos,
  getMatchingParenPosBackwards,
  mapOutsideQuotes,
  NOT_FOUND,
  splitTopLevelCommas,
} from "../core/text";

describe("splitTopLevelCommas", () => {
  it("splits only at depth zero", () => {
    expect(splitTopLevelCommas("a,(b,c),d")).toEqual(["a", "(b,c)", "d"]);
  });

  it("keeps a list nested one level deeper whole", () => {
    expect(splitTopLevelCommas("(a,(b,c))")).toEqual(["(a,(b,c))"]);
  });

  it("respects brackets and leaves pieces untrimmed", () => {
    expect(splitTopLevelCommas("x[1, 2], y")).toEqual(["x[1, 2]", " y"]);
  });

  it("reports an unmatched closer and keeps splitting", () => {
    const problems: string[] = [];
    expect(splitTopLevelCommas("a),b", (m) => problems.push(m))).toEqual(["a)", "b"]);
    expect(problems).toEqual(["unmatched ')'"]);
  });

  it("reports an unclosed opener", () => {
    const problems: string[] = [];
    splitTopLevelCommas("f(a,b", (m) => problems.push(m));
    expect(problems).toEqual(["unclosed '('"]);
  });
});

describe("paren matching", () => {
  it("finds the balancing ')' of the first '('", () => {
    expect(getMatchingParenPos("(a(b)c)x")).toBe(6);
  });

  it("returns the sentinel when the parentheses never close", () => {
    expect(getMatchingParenPos("(a(b")).toBe(NOT_FOUND);
  });

  it("searches backwards from the last ')'", () => {
    expect(getMatchingParenPosBackwards("x(a(b)c)")).toBe(1);
  });

  it("returns the sentinel for an unbalanced backward search", () => {
    expect(getMatchingParenPosBackwards("a(b))")).toBe(NOT_FOUND);
  });
});

describe("mapOutsideQuotes", () => {
  it("leaves literals untouched", () => {
    expect(mapOutsideQuotes("A 'B' C", (s) => s.toLowerCase())).toBe("a 'B' c");
  });
});
