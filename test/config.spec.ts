import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterAll, describe, it, expect } from "vitest";
import { DEFAULT_OPTIONS, findConfig, loadConfigFile, parseConfig, resolveOptions } from "../core/config";

describe("parseConfig", () => {
  it("keeps valid fields and reports unknown ones", () => {
    expect(parseConfig({ simplifySubscripts: false, bogus: 1 })).toEqual({
      options: { simplifySubscripts: false },
      problems: ['unknown option "bogus"'],
    });
  });

  it("rejects values of the wrong type", () => {
    const { options, problems } = parseConfig({ declarationPlacement: "middle", includes: ["cmath", 3] });
    expect(options).toEqual({});
    expect(problems).toEqual([
      '"declarationPlacement" must be "trailing" or "leading"',
      '"includes" must be an array of header names',
    ]);
  });

  it("requires an object", () => {
    expect(parseConfig([]).problems).toEqual(["configuration must be a JSON object"]);
  });
});

describe("resolveOptions", () => {
  it("lets later sources win and ignores undefined fields", () => {
    const options = resolveOptions({ emitPreamble: false, includes: ["cmath"] }, { emitPreamble: undefined });
    expect(options).toEqual({ ...DEFAULT_OPTIONS, emitPreamble: false, includes: ["cmath"] });
  });

  it("does not share the default include list", () => {
    resolveOptions().includes.push("vector");
    expect(DEFAULT_OPTIONS.includes).toEqual(["cstddef", "algorithm", "cmath", "complex"]);
  });
});

describe("loadConfigFile", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "f77cpp-config-"));

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("treats a missing file as empty", () => {
    expect(loadConfigFile(path.join(dir, "none.json"))).toEqual({ options: {}, problems: [] });
  });

  it("reports a file that is not JSON", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ nope", "utf8");
    const { options, problems } = loadConfigFile(file);
    expect(options).toEqual({});
    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith(`${file}: `)).toBe(true);
  });

  it("finds f77cpp.json in a directory", () => {
    fs.writeFileSync(path.join(dir, "f77cpp.json"), JSON.stringify({ declarationPlacement: "leading" }), "utf8");
    const found = findConfig(dir);
    expect(found.options).toEqual({ declarationPlacement: "leading" });
    expect(found.problems).toEqual([]);
    expect(found.source).toBe(path.join(dir, "f77cpp.json"));
  });
});
