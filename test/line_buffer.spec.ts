import { describe, it, expect } from "vitest";
import { deriveLine, LineBuffer } from "../core/line_buffer";
import { DiagnosticsSink, renderDiagnostic } from "../core/diagnostics";

describe("LineBuffer", () => {
  it("rewrite() keeps, drops and expands records in one step", () => {
    const buffer = LineBuffer.fromTexts(["a", "b", "c"]);
    buffer.rewrite((line) => {
      if (line.text === "b") return [];
      if (line.text === "c") return [line, deriveLine(line, "d", "other")];
      return undefined;
    });
    expect(buffer.texts()).toEqual(["a", "c", "d"]);
    expect(buffer.at(2)?.origin).toBe(3);
  });

  it("finds held records again after inserts", () => {
    const buffer = LineBuffer.fromTexts(["a", "b"]);
    const b = buffer.at(1);
    expect(b).toBeDefined();
    if (!b) return;
    buffer.rewrite((line) => (line === b ? [deriveLine(b, "x", "other"), b] : undefined));
    buffer.insertAfter(b, [deriveLine(b, "y", "other")]);
    expect(buffer.texts()).toEqual(["a", "x", "b", "y"]);
    expect(buffer.indexOf(b)).toBe(2);
  });

  it("remove() returns how many records went", () => {
    const buffer = LineBuffer.fromTexts(["a", "b", "a"]);
    expect(buffer.remove((l) => l.text === "a")).toBe(2);
    expect(buffer.texts()).toEqual(["b"]);
  });
});

describe("DiagnosticsSink", () => {
  it("drops exact duplicates and keeps line attachment", () => {
    const sink = new DiagnosticsSink();
    const [line] = LineBuffer.fromTexts(["x"]).toArray();
    sink.report("unmatched-delimiter", "unclosed '('", line);
    sink.report("unmatched-delimiter", "unclosed '('", line);
    sink.info("dynamic-array", "w(n) has non-literal dimensions");
    expect(sink.size).toBe(2);
    expect(sink.forLine(line).map((d) => d.code)).toEqual(["unmatched-delimiter"]);
    expect(sink.all()[1].severity).toBe("info");
  });

  it("lists entries whose line is gone as detached", () => {
    const sink = new DiagnosticsSink();
    const [kept, gone] = LineBuffer.fromTexts(["a", "b"]).toArray();
    sink.report("loop-form", "first", kept);
    sink.report("loop-form", "second", gone);
    sink.report("loop-form", "third");
    expect(sink.detached(new Set([kept])).map((d) => d.message)).toEqual(["second", "third"]);
  });

  it("renders as a tagged comment", () => {
    expect(renderDiagnostic({ severity: "warning", code: "loop-form", message: "check this" })).toBe(
      "// f77cpp: check this"
    );
  });
});
