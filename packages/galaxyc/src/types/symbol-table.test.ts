import { describe, it, expect } from "vitest";

import { Type } from "./definitions.js";
import { SymbolTable, createSymbol } from "./symbol-table.js";

describe("SymbolTable", () => {
  it("resolves the innermost binding first", () => {
    const table = new SymbolTable();
    table.define(createSymbol("x", Type.Basic.int, "variable"));

    table.enterFunction("f");
    table.define(createSymbol("x", Type.Basic.fixed, "parameter"));
    table.enterBlock();

    expect(table.lookup("x")?.type).toBe(Type.Basic.fixed);
    expect(table.lookupGlobal("x")?.type).toBe(Type.Basic.int);
    expect(table.lookupLocal("x")).toBeUndefined();
    expect(table.depth).toBe(2);
  });

  it("rejects a second definition in the same scope", () => {
    const table = new SymbolTable();
    const first = createSymbol("x", Type.Basic.int, "variable");

    expect(table.define(first)).toBe(true);
    expect(table.define(createSymbol("x", Type.Basic.string, "variable")))
      .toBe(false);
    expect(table.lookup("x")).toBe(first);
  });

  it("forgets block bindings when the block ends", () => {
    const table = new SymbolTable();
    table.enterBlock();
    table.define(createSymbol("tmp", Type.Basic.bool, "variable"));
    table.leaveScope();

    expect(table.lookup("tmp")).toBeUndefined();
  });

  it("never leaves the global scope", () => {
    const table = new SymbolTable();
    table.define(createSymbol("g", Type.Basic.int, "variable"));
    table.leaveScope();
    table.leaveScope();

    expect(table.depth).toBe(0);
    expect(table.lookup("g")?.name).toBe("g");
  });

  it("names the function a scope belongs to", () => {
    const table = new SymbolTable();
    table.enterFunction("main");

    expect(table.current.kind).toBe("function");
    expect(table.current.name).toBe("main");
    expect(table.global.kind).toBe("global");
  });

  it("fills in symbol defaults", () => {
    expect(createSymbol("f", Type.Basic.void_, "function")).toEqual({
      name: "f",
      type: Type.Basic.void_,
      kind: "function",
      isStatic: false,
      isConst: false,
      isNative: false,
      constValue: undefined,
      defined: true,
      declaration: undefined,
    });
  });
});
