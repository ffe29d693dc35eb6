/**
 * Base error class shared by every compiler phase
 */

import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export class GalaxyError extends Error {
  public readonly code: string;
  public readonly location?: SourceLocation;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.location = location;
    this.severity = severity;
  }
}
