/**
 * Parser-specific errors
 */

import { GalaxyError } from "#errors";
import type { SourceLocation } from "#ast";

/**
 * Syntax errors; `expected` lists what would have been accepted instead
 */
export class ParseError extends GalaxyError {
  public readonly expected?: string[];

  constructor(message: string, location: SourceLocation, expected?: string[]) {
    super(message, "PARSE_ERROR", location);
    this.expected = expected;
  }
}
