// types/stage.ts

import type { LineBuffer } from "../core/line_buffer";
import type { UnitContext } from "../core/context";

/**
 * TranslationStage: one pass of the pipeline.
 * Each stage owns the whole buffer for the duration of run() and may
 * rewrite any line, the symbol table and the unit context in place.
 */
export interface TranslationStage {
  /** Short identifier used in progress output and tests. */
  readonly name: string;

  run(buffer: LineBuffer, ctx: UnitContext): void;
}
