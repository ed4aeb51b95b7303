// language/intrinsics.ts

import { LineBuffer } from "../core/line_buffer";
import { mapOutsideQuotes } from "../core/text";
import { LineShape } from "../types/symbols";
import { TranslationStage } from "../types/stage";

const SIMPLE_INTRINSICS: Array<[RegExp, string]> = [
  [/\bdcmplx\b/g, "std::complex<double>"],
  [/\bdconjg\b/g, "std::conj"],
  [/\bdble\b/g, "std::real"],
  [/\bdimag\b/g, "std::imag"],
  [/(?<!::)\babs\b/g, "std::abs"],
  // mod(a, b) with plain operands only
  [/\bmod\s*\(\s*(\w+)\s*,\s*(\w+)\s*\)/g, "($1 % $2)"],
];

const SKIPPED_SHAPES: ReadonlySet<LineShape> = new Set<LineShape>(["blank", "comment", "label"]);

export function replaceIntrinsics(text: string): string {
  return mapOutsideQuotes(text, (code) =>
    SIMPLE_INTRINSICS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), code)
  );
}

export class IntrinsicsStage implements TranslationStage {
  readonly name = "intrinsics";

  run(buffer: LineBuffer): void {
    for (const line of buffer) {
      if (SKIPPED_SHAPES.has(line.shape)) continue;
      line.text = replaceIntrinsics(line.text);
    }
  }
}
