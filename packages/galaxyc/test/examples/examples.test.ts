/**
 * Example Files Test Suite
 *
 * Discovers every .galaxy file under examples/ and compiles it with the
 * bundled natives. The reported diagnostics and the types of the listed
 * globals must match the file's test block (see annotations.ts).
 */

import { describe, it, expect } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { glob } from "glob";

import { compileFile } from "#compiler";
import { NativeLoader } from "#natives";

import { parseExpectations, type ExpectedDiagnostic } from "./annotations.js";

const EXAMPLES_DIR = fileURLToPath(
  new URL("../../../../examples", import.meta.url),
);

const natives = (() => {
  const loader = new NativeLoader();
  loader.loadCommon();
  return loader.builtins();
})();

const byPosition = (a: ExpectedDiagnostic, b: ExpectedDiagnostic) =>
  a.line - b.line || a.code.localeCompare(b.code);

describe("Example Files", async () => {
  const files = (await glob("**/*.galaxy", { cwd: EXAMPLES_DIR })).sort();

  it("finds examples", () => {
    expect(files.length).toBeGreaterThan(0);
  });

  for (const relativePath of files) {
    it(relativePath, async () => {
      const fullPath = path.join(EXAMPLES_DIR, relativePath);
      const expectations = parseExpectations(
        await fs.readFile(fullPath, "utf-8"),
      );

      const result = compileFile(fullPath, { natives });

      const reported = result.diagnostics
        .sorted()
        .map(({ severity, code, line }) => ({ severity, code, line }))
        .sort(byPosition);
      expect(reported).toEqual([...expectations.diagnostics].sort(byPosition));

      if (expectations.fatal) {
        expect(result.ast).toBeNull();
        return;
      }
      expect(result.ast).not.toBeNull();

      for (const [name, type] of Object.entries(expectations.symbols)) {
        expect(
          result.symbolTable?.lookupGlobal(name)?.type.toString(),
          name,
        ).toBe(type);
      }
    });
  }
});
