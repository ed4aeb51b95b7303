// language/classify.ts

import { LineBuffer } from "../core/line_buffer";
import { LineShape, SourceLine } from "../types/symbols";
import { TranslationStage } from "../types/stage";

const TYPE_KEYWORD = "(?:logical|character|integer|ftnlen|doubleprecision|doublecomplex)";

export const HEADER_PATTERN = new RegExp(
  `^(?:(${TYPE_KEYWORD})(?:\\s*\\*\\s*\\S+)?\\s+)?(subroutine|function)\\s+(\\w+)\\s*(?:\\((.*?)\\)?)?\\s*$`
);
export const DECLARATION_PATTERN = new RegExp(`^(${TYPE_KEYWORD})\\b(?!\\s*(?:\\*\\s*\\S+\\s+)?function\\b)`);

/** Statements outside the translated subset; they are commented out. */
export const UNSUPPORTED_PATTERN =
  /^(common|equivalence|data|save|dimension|read|write|print|format|open|close|inquire|rewind|backspace|endfile|stop|pause|entry|namelist|include|program|block\s*data|assign)\b/;

/** Ordered: the first pattern that matches the statement decides its shape. */
const SHAPES: Array<{ shape: LineShape; regex: RegExp }> = [
  { shape: "header", regex: HEADER_PATTERN },
  { shape: "end", regex: /^end(?:\s+(?:subroutine|function)(?:\s+\w+)?)?\s*$/ },
  { shape: "parameter", regex: /^parameter\s*\(/ },
  { shape: "external", regex: /^external\b/ },
  { shape: "intrinsic", regex: /^intrinsic\b/ },
  { shape: "implicit", regex: /^implicit\b/ },
  { shape: "declaration", regex: DECLARATION_PATTERN },
  { shape: "loopEnd", regex: /^(?:enddo|end\s+do|continue)\s*$/ },
  { shape: "loop", regex: /^do\b(?!\s*=)/ },
  { shape: "conditional", regex: /^(?:if\s*\(|else\b|elseif\b|endif\b|end\s+if\b|\}\s*else)/ },
  { shape: "goto", regex: /^go\s*to\b/ },
  { shape: "call", regex: /^call\s+\w+/ },
  { shape: "return", regex: /^return\b/ },
  { shape: "assignment", regex: /^\w+\s*(?:\([^=]*\))?\s*=(?!=)/ },
];

/**
 * splitLabel(text):
 *   Separates a statement label held in columns 1–5 from the statement.
 */
export function splitLabel(text: string): { label?: string; statement: string; prefix: string } {
  const match = /^(\s*)(\d+)(\s+|$)/.exec(text);
  if (match && match[1].length + match[2].length <= 5) {
    return { label: match[2], statement: text.slice(match[0].length).trim(), prefix: match[0] };
  }
  return { statement: text.trim(), prefix: "" };
}

/**
 * classifyText(text):
 *   Classifies one already case-folded logical line into the closed set of
 *   shapes the stages dispatch on.
 */
export function classifyText(text: string): { shape: LineShape; label?: string } {
  if (/^\s*$/.test(text)) return { shape: "blank" };
  if (/^\s*\/\//.test(text)) return { shape: "comment" };
  if (/^\w+_l\d+:\s*$/i.test(text.trim())) return { shape: "label" };

  const { label, statement } = splitLabel(text);
  const found = SHAPES.find(({ regex }) => regex.test(statement));
  return { shape: found ? found.shape : "other", label };
}

/** Re-classifies `line` in place and returns it. */
export function classifyLine(line: SourceLine): SourceLine {
  if (line.shape === "comment") return line;
  const { shape, label } = classifyText(line.text);
  line.shape = shape;
  if (label) line.label = label;
  else delete line.label;
  return line;
}

export class ClassifyStage implements TranslationStage {
  readonly name = "classify";

  run(buffer: LineBuffer): void {
    for (const line of buffer) classifyLine(line);
  }
}
