// core/diagnostics.ts

import { Diagnostic, DiagnosticCode, Severity, SourceLine } from "../types/symbols";

/** Prefix of every diagnostic comment written into the output. */
export const DIAGNOSTIC_TAG = "f77cpp";

/**
 * DiagnosticsSink: collects the non-fatal issues found while translating one
 * unit. Nothing here throws; the emitter renders each entry as a comment
 * above the line it is attached to, or in the trailer when it has none.
 */
export class DiagnosticsSink {
  private readonly entries: Diagnostic[] = [];

  report(code: DiagnosticCode, message: string, line?: SourceLine, severity: Severity = "warning"): void {
    const duplicate = this.entries.some(
      (d) => d.code === code && d.message === message && d.line === line
    );
    if (duplicate) return;
    this.entries.push({ severity, code, message, line });
  }

  info(code: DiagnosticCode, message: string, line?: SourceLine): void {
    this.report(code, message, line, "info");
  }

  all(): Diagnostic[] {
    return [...this.entries];
  }

  forLine(line: SourceLine): Diagnostic[] {
    return this.entries.filter((d) => d.line === line);
  }

  /** Entries whose line is no longer part of `present`, plus unit-level ones. */
  detached(present: ReadonlySet<SourceLine>): Diagnostic[] {
    return this.entries.filter((d) => d.line === undefined || !present.has(d.line));
  }

  byCode(code: DiagnosticCode): Diagnostic[] {
    return this.entries.filter((d) => d.code === code);
  }

  get size(): number {
    return this.entries.length;
  }
}

export function renderDiagnostic(d: Diagnostic): string {
  return `// ${DIAGNOSTIC_TAG}: ${d.message}`;
}
