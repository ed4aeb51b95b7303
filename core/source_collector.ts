// core/source_collector.ts

import * as fs from "fs";
import * as path from "path";
import ignore from "ignore";

/** Fixed-form source extensions looked for in batch mode. */
export const DEFAULT_EXTENSIONS = [".f", ".for", ".f77"];

export const DEFAULT_IGNORE_PATTERNS = [
  "dist/",
  "build/",
  "node_modules/",
  ".git/",
  ".github/",
  "**/*.log",
];

///
// CollectorOptions: where and what to look for.
//
// - rootDir: directory to walk.
// - ignoreFiles: files (like ".gitignore", ".ignore") to read patterns from.
// - extraIgnorePatterns: patterns added on top of those files.
// - extensions: lowercase extensions to keep; defaults to DEFAULT_EXTENSIONS.
///
export interface CollectorOptions {
  rootDir: string;
  ignoreFiles?: string[];
  extraIgnorePatterns?: string[];
  extensions?: string[];
}

/**
 * SourceCollector: recursively walks rootDir, applies ignore rules the way
 * Git does, and returns the absolute paths of the fixed-form sources found.
 * Subdirectories that cannot be read are skipped and listed in
 * `unreadable`; an unreadable root is an error.
 */
export class SourceCollector {
  private ig = ignore();
  readonly unreadable: string[] = [];

  constructor(private opts: CollectorOptions) {
    const ignoreFiles = opts.ignoreFiles ?? [".gitignore", ".ignore"];
    for (const igFileName of ignoreFiles) {
      const fullPath = path.join(opts.rootDir, igFileName);
      if (fs.existsSync(fullPath) && fs.statSync(fullPath).isFile()) {
        const lines = fs
          .readFileSync(fullPath, "utf8")
          .split(/\r?\n/)
          .map((l) => l.trim())
          .filter((l) => l && !l.startsWith("#"));
        this.ig.add(lines);
      }
    }
    this.ig.add(opts.extraIgnorePatterns ?? DEFAULT_IGNORE_PATTERNS);
  }

  /** All matching sources under rootDir, sorted for a stable batch order. */
  public async collect(): Promise<string[]> {
    const result: string[] = [];
    await this.walk(this.opts.rootDir, result, true);
    return result.sort();
  }

  private async walk(dir: string, out: string[], isRoot: boolean): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      if (isRoot) throw new Error(`Cannot read directory ${dir}: ${reason}`);
      this.unreadable.push(dir);
      return;
    }

    const extensions = this.opts.extensions ?? DEFAULT_EXTENSIONS;
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      // Ignore patterns are relative to rootDir; directories need their trailing slash.
      const relPath = path.relative(this.opts.rootDir, fullPath);
      if (this.ig.ignores(entry.isDirectory() ? `${relPath}/` : relPath)) continue;

      if (entry.isDirectory()) {
        await this.walk(fullPath, out, false);
      } else if (entry.isFile() && extensions.includes(path.extname(entry.name).toLowerCase())) {
        out.push(fullPath);
      }
    }
  }
}
