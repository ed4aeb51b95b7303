// core/text.ts

/**
 * Character-level helpers shared by every stage that has to respect
 * parenthesis nesting: dimension lists, subscripts, loop bounds and call
 * argument lists are all split at depth zero only.
 */

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

/** Returned by the matching helpers when the parentheses never balance. */
export const NOT_FOUND = -1;

/**
 * getMatchingParenPos(str):
 *   Finds the first "(" in `str` and returns the index of the ")" that
 *   balances it, or NOT_FOUND.
 */
export function getMatchingParenPos(str: string): number {
  const open = str.indexOf("(");
  if (open === NOT_FOUND) return NOT_FOUND;
  let depth = 0;
  for (let i = open; i < str.length; i++) {
    const c = str[i];
    if (c === "(") depth++;
    else if (c === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return NOT_FOUND;
}

/**
 * getMatchingParenPosBackwards(str):
 *   Mirror of getMatchingParenPos: starts from the last ")" and returns the
 *   index of the "(" that opens it, or NOT_FOUND.
 */
export function getMatchingParenPosBackwards(str: string): number {
  const close = str.lastIndexOf(")");
  if (close === NOT_FOUND) return NOT_FOUND;
  let depth = 0;
  for (let i = close; i >= 0; i--) {
    const c = str[i];
    if (c === ")") depth++;
    else if (c === "(") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return NOT_FOUND;
}

/**
 * splitTopLevelCommas(str, onMismatch?):
 *   Splits a comma-delimited list on the commas that are not nested inside
 *   (), [] or {}. Pieces are returned untrimmed. Mismatched or unclosed
 *   delimiters are reported through `onMismatch`; splitting continues with
 *   the best depth it can assume.
 */
export function splitTopLevelCommas(
  str: string,
  onMismatch?: (message: string) => void
): string[] {
  const pieces: string[] = [];
  const stack: string[] = [];
  let current = "";

  for (const c of str) {
    if (c === "," && stack.length === 0) {
      pieces.push(current);
      current = "";
      continue;
    }
    current += c;
    if (c in OPENERS) {
      stack.push(c);
    } else if (c in CLOSERS) {
      const top = stack[stack.length - 1];
      if (top === CLOSERS[c]) {
        stack.pop();
      } else if (top === undefined) {
        onMismatch?.(`unmatched '${c}'`);
      } else {
        onMismatch?.(`unmatched '${top}'; got '${c}'`);
        stack.pop();
      }
    }
  }
  if (stack.length > 0) {
    onMismatch?.(`unclosed '${stack[stack.length - 1]}'`);
  }
  pieces.push(current);
  return pieces;
}

/** Leading whitespace of a line, with tabs counted as four columns. */
export function leadingWhitespace(line: string): string {
  const match = /^\s*/.exec(line);
  return (match ? match[0] : "").replace(/\t/g, "    ");
}

/**
 * mapOutsideQuotes(line, fn):
 *   Applies `fn` to every stretch of `line` that is not inside a quoted
 *   literal, leaving the literals themselves untouched.
 */
export function mapOutsideQuotes(line: string, fn: (code: string) => string): string {
  let out = "";
  let chunk = "";
  let quote: string | null = null;
  for (const c of line) {
    if (quote) {
      chunk += c;
      if (c === quote) {
        out += chunk;
        chunk = "";
        quote = null;
      }
    } else if (c === "'" || c === '"') {
      out += fn(chunk);
      chunk = c;
      quote = c;
    } else {
      chunk += c;
    }
  }
  return out + (quote ? chunk : fn(chunk));
}
