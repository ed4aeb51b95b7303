import { describe, it, expect } from "vitest";
import { continuationBody, readSource, splitTrailingComment } from "../language/source_reader";

describe("readSource", () => {
  const source = [
    "      subroutine s(a,",
    "     $             n)",
    "C comment",
    "      x = 'it!s' ! trailing",
    "",
    "\tcall f(x)",
    "",
  ].join("\n");

  it("joins continuations, tags comments and blanks, expands tabs", () => {
    const buffer = readSource(source);
    expect(buffer.texts()).toEqual([
      "      subroutine s(a, n)",
      "C comment",
      "      x = 'it!s'",
      "",
      "        call f(x)",
    ]);
    expect(buffer.toArray().map((l) => l.shape)).toEqual(["other", "comment", "other", "blank", "other"]);
  });

  it("keeps the physical line number of each record", () => {
    expect(readSource(source).toArray().map((l) => l.origin)).toEqual([1, 3, 4, 5, 6]);
  });

  it("sets trailing comments aside", () => {
    expect(readSource(source).at(2)?.trailingComment).toBe("trailing");
  });

  it("joins a column-6 continuation across an interleaved comment", () => {
    const buffer = readSource(["      x = a +", "c note", "     &    b"].join("\n"));
    expect(buffer.texts()).toEqual(["      x = a + b", "c note"]);
  });
});

describe("continuationBody", () => {
  it("accepts both markers and rejects a zero in column 6", () => {
    expect(continuationBody("     $ b")).toBe("b");
    expect(continuationBody("     1    b")).toBe("b");
    expect(continuationBody("     0    b")).toBeNull();
    expect(continuationBody("      b = 1")).toBeNull();
  });
});

describe("splitTrailingComment", () => {
  it("ignores '!' inside a literal", () => {
    expect(splitTrailingComment("      s = 'a!b'")).toEqual({ code: "      s = 'a!b'" });
  });
});
