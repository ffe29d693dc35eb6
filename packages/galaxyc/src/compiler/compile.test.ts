import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { ErrorCode } from "#diagnostics";
import { NativeLoader } from "#natives";
import { codes } from "#test/diagnostics";

import { compile, compileFile, fileSourceLoader } from "./compile.js";

describe("compile", () => {
  it("analyzes a well-formed unit", () => {
    const result = compile({ source: "int x = 1;" });

    expect(result.success).toBe(true);
    expect(result.ast?.items).toHaveLength(1);
    expect(result.diagnostics.count).toBe(0);
    expect(result.symbolTable?.lookupGlobal("x")?.type.toString()).toBe("int");
  });

  it("succeeds with warnings only", () => {
    const result = compile({ source: "void f() { y = 1; }" });

    expect(result.success).toBe(true);
    expect(codes(result.diagnostics)).toEqual(["warning GS001"]);
  });

  it("keeps the tree when analysis finds errors", () => {
    const result = compile({
      source: `int x = "s";`,
      sourceName: "main.galaxy",
    });

    expect(result.success).toBe(false);
    expect(result.ast).not.toBeNull();
    expect(codes(result.diagnostics)).toEqual(["error GS010"]);
    expect(result.diagnostics.errors[0].source).toBe("main.galaxy");
  });

  it("reports syntax errors with what was expected", () => {
    const result = compile({ source: "int x = 1\nint y;" });

    expect(result.success).toBe(false);
    expect(result.ast).toBeNull();
    expect(result.symbolTable).toBeNull();
    expect(result.diagnostics.report()).toBe(
      [
        "[ERROR] 2:1  Expected ';' but found 'int'",
        "  hint: expected ';'",
        "─".repeat(60),
        "1 error(s), 0 warning(s)",
      ].join("\n"),
    );
    expect(result.diagnostics.errors[0].code).toBe(ErrorCode.SYNTAX_ERROR);
    expect(result.diagnostics.errors[0].source).toBe("<input>");
  });

  it("names the expected category without quotes", () => {
    const result = compile({ source: "int v = ;" });

    expect(result.diagnostics.errors.map((d) => [d.message, d.hint])).toEqual([
      ["Expected an expression but found ';'", "expected expression"],
    ]);
  });

  it("reports a tree that cannot be built", () => {
    const depth = 100_000;
    const source = `int v = ${"(".repeat(depth)}1${")".repeat(depth)};`;

    const result = compile({ source });

    expect(result.success).toBe(false);
    expect(result.ast).toBeNull();
    expect(codes(result.diagnostics)).toEqual(["error GS101"]);
    expect(result.diagnostics.errors[0].message).toMatch(
      /^Could not build the syntax tree: /,
    );
  });

  it("casts to a type from an included unit", () => {
    const result = compile({
      source: 'include "lib"\nint v = (myint)3;',
      loadSource: () => "typedef int myint;",
    });

    expect(result.success).toBe(true);
    expect(result.diagnostics.count).toBe(0);
    expect(result.symbolTable?.lookupGlobal("v")?.type.toString()).toBe("int");
  });

  it("casts to a type declared further down", () => {
    const result = compile({
      source: "int v = (myint)3;\ntypedef int myint;",
    });

    expect(result.success).toBe(true);
    expect(result.diagnostics.count).toBe(0);
  });

  it("passes natives through to analysis", () => {
    const loader = new NativeLoader();
    loader.loadCommon();

    const result = compile({
      source: "timer t = TimerCreate();\nint n = StringLength(\"abc\");",
      natives: loader.builtins(),
    });

    expect(result.success).toBe(true);
    expect(result.diagnostics.count).toBe(0);
  });

  it("passes the nesting limit through to analysis", () => {
    const result = compile({
      source: `int v = ${"-".repeat(20)}1;`,
      maxDepth: 5,
    });

    expect(codes(result.diagnostics)).toEqual(["error GS900"]);
  });
});

describe("compileFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(path.join(tmpdir(), "galaxy-"));
    mkdirSync(path.join(dir, "lib"));
    writeFileSync(
      path.join(dir, "lib", "shared.galaxy"),
      "const int LIMIT = 3;\nint broken = \"s\";\n",
    );
    writeFileSync(
      path.join(dir, "main.galaxy"),
      'include "lib/shared"\nint[LIMIT] slots;\n',
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("resolves includes beside the file", () => {
    const file = path.join(dir, "main.galaxy");
    const result = compileFile(file);

    expect(result.symbolTable?.lookupGlobal("slots")?.type.toString()).toBe(
      "int[3]",
    );
    expect(
      result.diagnostics.sorted().map((d) => [d.code, d.source, d.line]),
    ).toEqual([["GS010", "lib/shared", 2]]);
  });

  it("reports a missing file", () => {
    const file = path.join(dir, "absent.galaxy");
    const result = compileFile(file);

    expect(result.ast).toBeNull();
    expect(result.success).toBe(false);
    expect(result.diagnostics.errors.map((d) => d.message)).toEqual([
      `Source file '${file}' not found`,
    ]);
    expect(result.diagnostics.errors[0].code).toBe(ErrorCode.FILE_NOT_FOUND);
  });

  it("loads include text keyed by the resolved file", () => {
    const load = fileSourceLoader(dir);
    const shared = {
      source: "const int LIMIT = 3;\nint broken = \"s\";\n",
      key: path.join(dir, "lib", "shared.galaxy"),
    };

    expect(load("lib/shared.galaxy")).toEqual(shared);
    expect(load("lib/shared")).toEqual(shared);
    expect(load("lib/absent")).toBeUndefined();
  });

  it("analyzes a file once however its includes spell it", () => {
    writeFileSync(
      path.join(dir, "twice.galaxy"),
      'include "lib/shared"\ninclude "lib/shared.galaxy"\n',
    );

    const result = compileFile(path.join(dir, "twice.galaxy"));

    expect(result.diagnostics.sorted().map((d) => d.code)).toEqual(["GS010"]);
  });
});
