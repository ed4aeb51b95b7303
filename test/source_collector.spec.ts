import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { SourceCollector } from "../core/source_collector";

describe("SourceCollector", () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "f77cpp-collect-"));
    fs.mkdirSync(path.join(root, "sub"));
    fs.mkdirSync(path.join(root, "ignored"));
    fs.writeFileSync(path.join(root, "a.f"), "      end\n");
    fs.writeFileSync(path.join(root, "sub", "b.FOR"), "      end\n");
    fs.writeFileSync(path.join(root, "ignored", "c.f"), "      end\n");
    fs.writeFileSync(path.join(root, "d.txt"), "notes\n");
    fs.writeFileSync(path.join(root, ".gitignore"), "# local\nignored/\n");
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("finds fixed-form sources and honours ignore files", async () => {
    const files = await new SourceCollector({ rootDir: root }).collect();
    expect(files).toEqual([path.join(root, "a.f"), path.join(root, "sub", "b.FOR")]);
  });

  it("restricts to the given extensions", async () => {
    const files = await new SourceCollector({ rootDir: root, extensions: [".for"] }).collect();
    expect(files).toEqual([path.join(root, "sub", "b.FOR")]);
  });

  it("fails on a missing root", async () => {
    await expect(new SourceCollector({ rootDir: path.join(root, "absent") }).collect()).rejects.toThrow(
      /Cannot read directory/
    );
  });
});
