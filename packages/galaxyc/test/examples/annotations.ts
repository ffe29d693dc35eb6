/**
 * Test Block Parser
 *
 * Reads the expectations of an example file from a fenced YAML block:
 *
 *   /*@test
 *   fatal: true            # the tree could not be built
 *   diagnostics:
 *     - { severity: error, code: GS010, line: 8 }
 *   symbols:
 *     total: int           # global name -> rendered type
 *   *\/
 *
 * A file without a block is expected to analyze cleanly.
 */

import YAML from "yaml";

import { Severity } from "#result";

export interface ExpectedDiagnostic {
  severity: Severity;
  code: string;
  line: number;
}

export interface Expectations {
  fatal: boolean;
  diagnostics: ExpectedDiagnostic[];
  symbols: Record<string, string>;
}

const TEST_BLOCK = /\/\*@test\s*\n([\s\S]*?)\*\//;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isSeverity = (value: unknown): value is Severity =>
  value === Severity.Error || value === Severity.Warning;

function toDiagnostic(entry: unknown): ExpectedDiagnostic {
  if (
    !isRecord(entry) ||
    !isSeverity(entry.severity) ||
    typeof entry.code !== "string" ||
    typeof entry.line !== "number"
  ) {
    throw new Error(`Malformed diagnostic expectation: ${JSON.stringify(entry)}`);
  }
  return { severity: entry.severity, code: entry.code, line: entry.line };
}

function toSymbols(value: unknown): Record<string, string> {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error("'symbols' must map names to types");
  }

  const symbols: Record<string, string> = {};
  for (const [name, type] of Object.entries(value)) {
    if (typeof type !== "string") {
      throw new Error(`Expected a type string for symbol '${name}'`);
    }
    symbols[name] = type;
  }
  return symbols;
}

export function parseExpectations(source: string): Expectations {
  const match = TEST_BLOCK.exec(source);
  if (!match) {
    return { fatal: false, diagnostics: [], symbols: {} };
  }

  const parsed: unknown = YAML.parse(match[1]);
  if (!isRecord(parsed)) {
    throw new Error("Test block must be a YAML mapping");
  }

  const { fatal = false, diagnostics = [], symbols } = parsed;
  if (typeof fatal !== "boolean") {
    throw new Error("'fatal' must be true or false");
  }
  if (!Array.isArray(diagnostics)) {
    throw new Error("'diagnostics' must be a list");
  }

  return {
    fatal,
    diagnostics: diagnostics.map(toDiagnostic),
    symbols: toSymbols(symbols),
  };
}
