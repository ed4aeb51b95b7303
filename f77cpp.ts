#!/usr/bin/env node
// f77cpp.ts

/**
 * Entry point for the fixed-form Fortran 77 to C++ translator.
 *
 * - Parses CLI flags:
 *   [positional file]   : e.g. `f77cpp dnrm2.f --out dnrm2.cpp`
 *   --out <file>        : write the translation here instead of stdout
 *   --root <dir>        : batch mode, translate every source under <dir>
 *   --out-dir <dir>     : batch output directory (defaults to beside each source)
 *   --ext <list>        : comma-separated source extensions for batch mode
 *   --no-simplify       : keep linearized subscripts unsimplified
 *   --leading-decls     : put synthesized declarations before the unit
 *   --config <file>     : options file (defaults to f77cpp.json in the cwd or root)
 *   --quiet             : no progress output
 *
 * Translation problems never fail the run; they are written into the
 * output as comments. The exit code is 1 only when files cannot be read
 * or written.
 */

import * as fs from "fs";
import * as path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ConfigLoadResult, findConfig, loadConfigFile, resolveOptions, TranslatorOptions } from "./core/config";
import { translateFile, TranslationResult } from "./core/pipeline";
import { DEFAULT_EXTENSIONS, SourceCollector } from "./core/source_collector";

type Logger = (message: string) => void;

/**
 * loadOptions(configPath, searchDir, flags):
 *   Defaults, then the config file, then CLI flags. Problems in the file
 *   are warned about and the file's bad fields are ignored.
 */
function loadOptions(
  configPath: string | undefined,
  searchDir: string,
  flags: Partial<TranslatorOptions>
): TranslatorOptions {
  let loaded: ConfigLoadResult;
  if (configPath) {
    const resolved = path.resolve(configPath);
    if (!fs.existsSync(resolved)) throw new Error(`Config file not found: ${resolved}`);
    loaded = loadConfigFile(resolved);
  } else {
    loaded = findConfig(searchDir);
  }
  for (const problem of loaded.problems) console.warn(`⚠️  ${problem}`);
  return resolveOptions(loaded.options, flags);
}

function summarize(result: TranslationResult, label: string, log: Logger): void {
  const warnings = result.diagnostics.filter((d) => d.severity === "warning").length;
  const notes = result.diagnostics.length - warnings;
  if (warnings > 0) {
    console.warn(`⚠️  ${label}: ${warnings} warning(s), ${notes} note(s) written into the output`);
  } else {
    log(`✅ ${label}: translated ${result.unitName ?? "unit"} (${notes} note(s))`);
  }
}

function runSingle(file: string, out: string | undefined, options: TranslatorOptions, log: Logger): void {
  const input = path.resolve(file);
  const result = translateFile(input, options);
  if (!out) {
    process.stdout.write(result.text);
    return;
  }
  const target = path.resolve(out);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, result.text, "utf8");
  summarize(result, path.basename(input), log);
  log(`   ↳ File path: ${target}`);
}

/**
 * runBatch(rootDir, outDir, extensions, options, log):
 *   Translates every source under rootDir, each in its own unit context.
 *   A file that fails to read or write is warned about and skipped.
 *   Returns the number of such failures.
 */
async function runBatch(
  rootDir: string,
  outDir: string | undefined,
  extensions: string[],
  options: TranslatorOptions,
  log: Logger
): Promise<number> {
  log(`🔍 Collecting sources under ${rootDir}…`);
  const collector = new SourceCollector({ rootDir, extensions });
  const files = await collector.collect();
  for (const dir of collector.unreadable) console.warn(`⚠️ Cannot read directory ${dir}; skipped.`);
  if (files.length === 0) {
    throw new Error(`No sources with extension ${extensions.join(", ")} found under ${rootDir}`);
  }
  log(`➡️  Translating ${files.length} file(s)`);

  let failures = 0;
  for (const file of files) {
    const relative = path.relative(rootDir, file);
    const cppName = relative.replace(/\.[^./\\]+$/, ".cpp");
    const target = outDir ? path.join(outDir, cppName) : path.join(rootDir, cppName);
    try {
      const result = translateFile(file, options);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, result.text, "utf8");
      summarize(result, relative, log);
    } catch (err) {
      failures++;
      console.warn(`⚠️  ${relative}: ${err instanceof Error ? err.message : String(err)}. Skipping.`);
    }
  }
  log(`✅ Done: ${files.length - failures} of ${files.length} file(s) written.`);
  return failures;
}

async function main() {
  const argv = yargs(hideBin(process.argv))
    .usage("$0 [file] [options]")
    .option("out", {
      alias: "o",
      type: "string",
      description: "Output file for single-file mode (defaults to stdout).",
    })
    .option("root", {
      alias: "r",
      type: "string",
      description: "Translate every fixed-form source under this directory.",
    })
    .option("out-dir", {
      type: "string",
      description: "Batch output directory; relative paths are kept.",
    })
    .option("ext", {
      type: "string",
      description: `Comma-separated source extensions for batch mode (default "${DEFAULT_EXTENSIONS.join(",")}").`,
    })
    .option("simplify", {
      type: "boolean",
      description: "Simplify linearized subscripts (use --no-simplify to keep them verbatim).",
    })
    .option("leading-decls", {
      type: "boolean",
      description: "Emit synthesized declarations before the unit instead of after it.",
    })
    .option("config", {
      alias: "c",
      type: "string",
      description: "Path to an f77cpp.json options file.",
    })
    .option("quiet", {
      alias: "q",
      type: "boolean",
      description: "Suppress progress output.",
    })
    .help()
    .alias("help", "h")
    .parseSync();

  const positional = argv._.length > 0 ? String(argv._[0]) : "";
  const rootDir = argv.root ? path.resolve(argv.root) : undefined;
  const quiet = argv.quiet === true || (!rootDir && !argv.out);
  const log: Logger = (message) => {
    if (!quiet) console.log(message);
  };

  const flags: Partial<TranslatorOptions> = {};
  if (argv.simplify !== undefined) flags.simplifySubscripts = argv.simplify;
  if (argv["leading-decls"]) flags.declarationPlacement = "leading";
  const options = loadOptions(argv.config, rootDir ?? process.cwd(), flags);

  if (rootDir) {
    const extensions = argv.ext
      ? argv.ext
          .split(",")
          .map((e) => e.trim().toLowerCase())
          .filter((e) => e.length > 0)
          .map((e) => (e.startsWith(".") ? e : `.${e}`))
      : DEFAULT_EXTENSIONS;
    const outDir = argv["out-dir"] ? path.resolve(argv["out-dir"]) : undefined;
    const failures = await runBatch(rootDir, outDir, extensions, options, log);
    if (failures > 0) process.exitCode = 1;
    return;
  }

  if (!positional) {
    console.error("❌ No input file given. Pass a source file or --root <dir>.");
    process.exit(1);
  }
  runSingle(positional, argv.out, options, log);
}

main().catch((err) => {
  console.error("❌ f77cpp failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
