import type { SourceLocation } from "#ast";
import { GalaxyError } from "#errors";
import { Severity } from "#result";

export interface DiagnosticOptions {
  hint?: string;
  /**
   * Name of the source unit the finding belongs to, when it is not the
   * main unit (e.g. an included file)
   */
  source?: string;
}

/**
 * A single semantic finding
 */
export class Diagnostic extends GalaxyError {
  public readonly hint?: string;
  public readonly source?: string;

  constructor(
    severity: Severity,
    message: string,
    code: string,
    location?: SourceLocation,
    options: DiagnosticOptions = {},
  ) {
    super(message, code, location, severity);
    this.hint = options.hint;
    this.source = options.source;
  }

  get line(): number {
    return this.location?.line ?? -1;
  }

  get column(): number {
    return this.location?.column ?? -1;
  }

  override toString(): string {
    const position = this.line > 0 ? `${this.line}:${this.column}` : "?:?";
    const base = `[${this.severity.toUpperCase()}] ${position}  ${this.message}`;
    return this.hint ? `${base}\n  hint: ${this.hint}` : base;
  }
}
