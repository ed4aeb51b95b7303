// core/pipeline.ts

import * as fs from "fs";
import { Diagnostic } from "../types/symbols";
import { TranslationStage } from "../types/stage";
import { getStages } from "../language";
import { emitUnit } from "../language/emitter";
import { readSource } from "../language/source_reader";
import { TranslatorOptions } from "./config";
import { createUnitContext, UnitContext } from "./context";
import { LineBuffer } from "./line_buffer";

export interface TranslationResult {
  /** The translated unit, ready to write. */
  text: string;
  diagnostics: Diagnostic[];
  indexVariables: string[];
  /** Name of the subroutine or function, when a header was found. */
  unitName?: string;
}

/** Runs `stages` in order; each one finishes before the next starts. */
export function runStages(buffer: LineBuffer, ctx: UnitContext, stages: TranslationStage[] = getStages()): void {
  for (const stage of stages) stage.run(buffer, ctx);
}

/**
 * translateSource(source, options):
 *   Translates one fixed-form unit held in memory. Each call works on a
 *   fresh Unit Context; malformed input only adds diagnostics.
 */
export function translateSource(source: string, options?: Partial<TranslatorOptions>): TranslationResult {
  const ctx = createUnitContext(options);
  const buffer = readSource(source);
  runStages(buffer, ctx);
  const { text, indexVariables } = emitUnit(buffer, ctx);
  return {
    text,
    diagnostics: ctx.diagnostics.all(),
    indexVariables,
    unitName: ctx.subroutine?.name,
  };
}

/**
 * translateFile(filePath, options):
 *   Reads and translates one source file. Throws only when the file
 *   cannot be read.
 */
export function translateFile(filePath: string, options?: Partial<TranslatorOptions>): TranslationResult {
  let source: string;
  try {
    source = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not open ${filePath}: ${reason}`);
  }
  return translateSource(source, options);
}
