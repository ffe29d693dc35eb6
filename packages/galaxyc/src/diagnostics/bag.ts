import type { SourceLocation } from "#ast";
import { type MessagesBySeverity, Result, Severity } from "#result";

import { Diagnostic, type DiagnosticOptions } from "./diagnostic.js";

/**
 * Append-only collection of diagnostics for one analysis run
 */
export class DiagnosticBag implements Iterable<Diagnostic> {
  private diagnostics: Diagnostic[] = [];

  error(
    message: string,
    code: string,
    location?: SourceLocation | null,
    options?: DiagnosticOptions,
  ): Diagnostic {
    return this.add(
      new Diagnostic(
        Severity.Error,
        message,
        code,
        location ?? undefined,
        options,
      ),
    );
  }

  warning(
    message: string,
    code: string,
    location?: SourceLocation | null,
    options?: DiagnosticOptions,
  ): Diagnostic {
    return this.add(
      new Diagnostic(
        Severity.Warning,
        message,
        code,
        location ?? undefined,
        options,
      ),
    );
  }

  add(diagnostic: Diagnostic): Diagnostic {
    this.diagnostics.push(diagnostic);
    return diagnostic;
  }

  get hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === Severity.Error);
  }

  get errors(): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === Severity.Error);
  }

  get warnings(): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === Severity.Warning);
  }

  get count(): number {
    return this.diagnostics.length;
  }

  [Symbol.iterator](): Iterator<Diagnostic> {
    return this.diagnostics[Symbol.iterator]();
  }

  /**
   * Diagnostics ordered by position; entries without a position first
   */
  sorted(): Diagnostic[] {
    return [...this.diagnostics].sort(
      (a, b) => a.line - b.line || a.column - b.column,
    );
  }

  /**
   * Human-readable listing followed by a summary line
   */
  report(): string {
    if (this.diagnostics.length === 0) {
      return "No diagnostics.";
    }

    const lines = this.sorted().map((d) => d.toString());
    const summary = `${this.errors.length} error(s), ${this.warnings.length} warning(s)`;
    return `${lines.join("\n")}\n${"─".repeat(60)}\n${summary}`;
  }

  toMessages(): MessagesBySeverity<Diagnostic> {
    return Result.group(this.diagnostics);
  }
}
