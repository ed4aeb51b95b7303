// core/config.ts

import * as fs from "fs";
import * as path from "path";

/**
 * TranslatorOptions: knobs that change what the pipeline writes, not how it
 * analyses the unit.
 *
 * - simplifySubscripts   : run the bounded index simplifier over new brackets.
 * - emitPreamble         : write the #define/#include block.
 * - emitIndexReport      : write the detected index-variable advisory line.
 * - declarationPlacement : synthesized declarations after the unit ("trailing")
 *                          or between preamble and unit ("leading").
 * - includes             : headers named in the preamble.
 */
export interface TranslatorOptions {
  simplifySubscripts: boolean;
  emitPreamble: boolean;
  emitIndexReport: boolean;
  declarationPlacement: "trailing" | "leading";
  includes: string[];
}

export const DEFAULT_OPTIONS: TranslatorOptions = {
  simplifySubscripts: true,
  emitPreamble: true,
  emitIndexReport: true,
  declarationPlacement: "trailing",
  includes: ["cstddef", "algorithm", "cmath", "complex"],
};

export const CONFIG_FILE_NAME = "f77cpp.json";

export interface ConfigLoadResult {
  options: Partial<TranslatorOptions>;
  /** Human-readable reasons a file or one of its fields was ignored. */
  problems: string[];
  source?: string;
}

/** Later sources win; undefined fields never override. */
export function resolveOptions(
  ...sources: Array<Partial<TranslatorOptions> | undefined>
): TranslatorOptions {
  const resolved: TranslatorOptions = { ...DEFAULT_OPTIONS, includes: [...DEFAULT_OPTIONS.includes] };
  for (const source of sources) {
    if (!source) continue;
    if (source.simplifySubscripts !== undefined) resolved.simplifySubscripts = source.simplifySubscripts;
    if (source.emitPreamble !== undefined) resolved.emitPreamble = source.emitPreamble;
    if (source.emitIndexReport !== undefined) resolved.emitIndexReport = source.emitIndexReport;
    if (source.declarationPlacement !== undefined) {
      resolved.declarationPlacement = source.declarationPlacement;
    }
    if (source.includes !== undefined) resolved.includes = [...source.includes];
  }
  return resolved;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * parseConfig(raw):
 *   Validates an already-parsed JSON value field by field. Unknown keys and
 *   fields of the wrong type are reported and skipped; the rest is kept.
 */
export function parseConfig(raw: unknown): ConfigLoadResult {
  const problems: string[] = [];
  const options: Partial<TranslatorOptions> = {};
  if (!isRecord(raw)) {
    return { options, problems: ["configuration must be a JSON object"] };
  }

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "simplifySubscripts":
        if (typeof value === "boolean") options.simplifySubscripts = value;
        else problems.push(`"${key}" must be a boolean`);
        break;
      case "emitPreamble":
        if (typeof value === "boolean") options.emitPreamble = value;
        else problems.push(`"${key}" must be a boolean`);
        break;
      case "emitIndexReport":
        if (typeof value === "boolean") options.emitIndexReport = value;
        else problems.push(`"${key}" must be a boolean`);
        break;
      case "declarationPlacement":
        if (value === "trailing" || value === "leading") options.declarationPlacement = value;
        else problems.push(`"declarationPlacement" must be "trailing" or "leading"`);
        break;
      case "includes":
        if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
          options.includes = value;
        } else {
          problems.push(`"includes" must be an array of header names`);
        }
        break;
      default:
        problems.push(`unknown option "${key}"`);
    }
  }
  return { options, problems };
}

/**
 * loadConfigFile(filePath):
 *   Reads and validates one configuration file. A missing file yields empty
 *   options; an unreadable or unparsable one yields empty options and a
 *   problem entry, so the caller can warn and carry on with defaults.
 */
export function loadConfigFile(filePath: string): ConfigLoadResult {
  if (!fs.existsSync(filePath)) return { options: {}, problems: [] };
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { options: {}, problems: [`${filePath}: ${reason}`], source: filePath };
  }
  const parsed = parseConfig(raw);
  return {
    options: parsed.options,
    problems: parsed.problems.map((p) => `${filePath}: ${p}`),
    source: filePath,
  };
}

/** Looks for f77cpp.json in `dir`. */
export function findConfig(dir: string): ConfigLoadResult {
  return loadConfigFile(path.join(dir, CONFIG_FILE_NAME));
}
