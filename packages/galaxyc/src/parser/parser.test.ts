import { describe, it, expect } from "vitest";

import * as Ast from "#ast";
import { Result } from "#result";
import { findFunction, findVariable, parseUnit } from "#test/diagnostics";

import { parse } from "./parser.js";

function parseError(source: string) {
  const result = parse(source);
  expect(result.success).toBe(false);
  const error = Result.firstError(result);
  if (!error) {
    throw new Error("Expected a parse error");
  }
  return error;
}

/**
 * Statements of the body of `f`
 */
function bodyOf(source: string): Ast.Statement[] {
  return findFunction(parseUnit(source), "f").body?.items ?? [];
}

describe("Parser", () => {
  describe("top level", () => {
    it("reads both include spellings", () => {
      const unit = parseUnit(`
        #include "lib/a"
        include "b.galaxy";
      `);

      expect(unit.items).toMatchObject([
        { type: "IncludeDirective", path: "lib/a" },
        { type: "IncludeDirective", path: "b.galaxy" },
      ]);
    });

    it("skips stray semicolons", () => {
      expect(parseUnit(";; int x;;").items).toHaveLength(1);
    });

    it("splits declarators into separate declarations", () => {
      const unit = parseUnit("int a, b[3] = {1, 2}, c = 4;");

      const [a, b, c] = ["a", "b", "c"].map((name) => findVariable(unit, name));
      expect(a.declaredType.dimensions).toEqual([]);
      expect(b.declaredType.dimensions).toMatchObject([
        { type: "LiteralExpression", value: "3" },
      ]);
      expect(b.initializer).toMatchObject({
        type: "InitializerExpression",
        elements: [{ value: "1" }, { value: "2" }],
      });
      expect(c.initializer).toMatchObject({ kind: "int", value: "4" });
      expect(a.declaredType).not.toBe(c.declaredType);
    });

    it("keeps dimensions before and after the name in order", () => {
      const { declaredType } = findVariable(parseUnit("int[2] grid[3];"), "grid");

      expect(declaredType.name).toBe("int");
      expect(declaredType.dimensions).toMatchObject([
        { value: "2" },
        { value: "3" },
      ]);
    });

    it("reads omitted dimensions as null", () => {
      const { declaredType } = findVariable(parseUnit("int[] xs;"), "xs");

      expect(declaredType.dimensions).toEqual([null]);
    });

    it("reads modifiers", () => {
      const variable = findVariable(
        parseUnit("static const int X = 1;"),
        "X",
      );

      expect(variable.isStatic).toBe(true);
      expect(variable.isConst).toBe(true);
    });

    it("gives each struct member its own type", () => {
      const [struct] = parseUnit("struct P { int x, y; fixed z[2]; };").items;

      expect(struct).toMatchObject({
        kind: "struct",
        name: "P",
        members: [
          { name: "x", declaredType: { name: "int", dimensions: [] } },
          { name: "y", declaredType: { name: "int", dimensions: [] } },
          {
            name: "z",
            declaredType: { name: "fixed", dimensions: [{ value: "2" }] },
          },
        ],
      });
    });

    it("reads typedefs with trailing dimensions", () => {
      const [typedef] = parseUnit("typedef int Row[4];").items;

      expect(typedef).toMatchObject({
        kind: "typedef",
        name: "Row",
        declaredType: { name: "int", dimensions: [{ value: "4" }] },
      });
    });

    it("reads functions, prototypes and natives", () => {
      const unit = parseUnit(`
        void f(void) {}
        int g(int a, const int[2] b);
        native unit N(string s);
        static bool h() { return true; }
      `);

      const f = findFunction(unit, "f");
      expect(f.parameters).toEqual([]);
      expect(f.body?.items).toEqual([]);

      const g = findFunction(unit, "g");
      expect(g.body).toBeUndefined();
      expect(g.parameters).toMatchObject([
        { name: "a", isConst: false },
        { name: "b", isConst: true, declaredType: { dimensions: [{}] } },
      ]);

      const n = findFunction(unit, "N");
      expect(n.isNative).toBe(true);
      expect(n.returnType.name).toBe("unit");

      expect(findFunction(unit, "h").isStatic).toBe(true);
    });
  });

  describe("statements", () => {
    it("tells declarations from expressions", () => {
      const items = bodyOf(`
        struct P { int x; };
        void f() {
          P p;
          p.x = 1;
          a[1] = 2;
          int[2] q;
          g(p);
        }
      `);

      expect(items.map((item) => item.type)).toEqual([
        "DeclarationStatement",
        "ExpressionStatement",
        "ExpressionStatement",
        "DeclarationStatement",
        "ExpressionStatement",
      ]);
    });

    it("binds else to the nearest if", () => {
      const [outer] = bodyOf("void f() { if (a) if (b) x(); else y(); }");

      expect(outer).toMatchObject({
        kind: "if",
        alternate: undefined,
        body: { kind: "if", alternate: { type: "ExpressionStatement" } },
      });
    });

    it("reads every loop form", () => {
      const items = bodyOf(`
        void f() {
          while (i < 3) i += 1;
          do { i -= 1; } while (i > 0);
          for (int j = 0; j < 3; j += 1) {}
          for (i = 0, k = 1; ; i += 1, k += 1) {}
          for (;;) ;
        }
      `);

      expect(items).toMatchObject([
        { kind: "while", body: { type: "ExpressionStatement" } },
        { kind: "do-while", body: { type: "Block" } },
        {
          kind: "for",
          init: { type: "DeclarationStatement", declaration: { name: "j" } },
          condition: { operator: "<" },
          update: { type: "AssignmentExpression", operator: "+=" },
        },
        {
          kind: "for",
          init: {
            type: "ExpressionStatement",
            expression: { type: "SequenceExpression" },
          },
          condition: undefined,
          update: { type: "SequenceExpression" },
        },
        {
          kind: "for",
          init: undefined,
          condition: undefined,
          update: undefined,
          body: { type: "ExpressionStatement", expression: undefined },
        },
      ]);
    });

    it("reads jumps", () => {
      const items = bodyOf(`
        void f() {
          return;
          return 1;
          break;
          continue;
          breakpoint;
        }
      `);

      expect(items).toMatchObject([
        { kind: "return", value: undefined },
        { kind: "return", value: { value: "1" } },
        { kind: "break" },
        { kind: "continue" },
        { kind: "breakpoint" },
      ]);
    });
  });

  describe("expressions", () => {
    const initializerOf = (source: string) =>
      findVariable(parseUnit(source), "v").initializer;

    it("follows operator precedence", () => {
      expect(initializerOf("int v = 1 + 2 * 3 << 1;")).toMatchObject({
        operator: "<<",
        operands: [
          {
            operator: "+",
            operands: [{ value: "1" }, { operator: "*" }],
          },
          { value: "1" },
        ],
      });

      expect(initializerOf("bool v = a || b && c == d;")).toMatchObject({
        operator: "||",
        operands: [{ name: "a" }, { operator: "&&" }],
      });
    });

    it("associates binary operators to the left", () => {
      expect(initializerOf("int v = 1 - 2 - 3;")).toMatchObject({
        operator: "-",
        operands: [{ operator: "-" }, { value: "3" }],
      });
    });

    it("associates assignment to the right", () => {
      const [statement] = bodyOf("void f() { a = b += c; }");

      expect(statement).toMatchObject({
        expression: {
          type: "AssignmentExpression",
          operator: "=",
          target: { name: "a" },
          value: { operator: "+=", target: { name: "b" } },
        },
      });
    });

    it("reads conditionals", () => {
      expect(initializerOf("int v = a ? 1 : b ? 2 : 3;")).toMatchObject({
        type: "ConditionalExpression",
        condition: { name: "a" },
        alternate: { type: "ConditionalExpression", condition: { name: "b" } },
      });
    });

    it("tells casts from parenthesized expressions", () => {
      const unit = parseUnit(`
        typedef int Score;
        int a = (int) b;
        int c = (Score) -d;
        int e = (a) - 1;
        int g = (fixed)(1);
      `);

      expect(findVariable(unit, "a").initializer).toMatchObject({
        type: "CastExpression",
        targetType: { name: "int" },
        expression: { name: "b" },
      });
      expect(findVariable(unit, "c").initializer).toMatchObject({
        type: "CastExpression",
        targetType: { name: "Score" },
        expression: { operator: "-" },
      });
      expect(findVariable(unit, "e").initializer).toMatchObject({
        type: "OperatorExpression",
        operator: "-",
        operands: [{ name: "a" }, { value: "1" }],
      });
      expect(findVariable(unit, "g").initializer).toMatchObject({
        type: "CastExpression",
        targetType: { name: "fixed" },
      });
    });

    it("recognizes casts to types declared further down", () => {
      const unit = parseUnit(`
        int a = (Score) -b;
        int c = (Point)(d);
        struct Point { int x; };
        typedef int Score;
      `);

      expect(findVariable(unit, "a").initializer).toMatchObject({
        type: "CastExpression",
        targetType: { name: "Score" },
        expression: { operator: "-" },
      });
      expect(findVariable(unit, "c").initializer).toMatchObject({
        type: "CastExpression",
        targetType: { name: "Point" },
        expression: { name: "d" },
      });
    });

    it("recognizes casts to names it has not seen declared", () => {
      const unit = parseUnit(`
        int a = (myint) 3;
        int b = (myint) c;
        int d = (myint) !e;
        int f = (g) - 1;
        int h = (k)(1);
      `);

      expect(findVariable(unit, "a").initializer).toMatchObject({
        type: "CastExpression",
        targetType: { name: "myint" },
        expression: { value: "3" },
      });
      expect(findVariable(unit, "b").initializer).toMatchObject({
        type: "CastExpression",
        expression: { name: "c" },
      });
      expect(findVariable(unit, "d").initializer).toMatchObject({
        type: "CastExpression",
        expression: { operator: "!" },
      });
      expect(findVariable(unit, "f").initializer).toMatchObject({
        type: "OperatorExpression",
        operator: "-",
      });
      expect(findVariable(unit, "h").initializer).toMatchObject({
        type: "CallExpression",
        callee: { name: "k" },
      });
    });

    it("reads postfix chains", () => {
      expect(initializerOf("int v = s.items[i + 1].next(2, 3);")).toMatchObject(
        {
          type: "CallExpression",
          arguments: [{ value: "2" }, { value: "3" }],
          callee: {
            kind: "member",
            property: "next",
            object: {
              kind: "index",
              index: { operator: "+" },
              object: { kind: "member", property: "items" },
            },
          },
        },
      );
    });

    it("keeps literal spellings", () => {
      const unit = parseUnit(`
        bool t = true;
        string s = "hi\\n";
        fixed f = 2.50;
        unit u = null;
        int h = 0xff;
      `);

      expect(
        ["t", "s", "f", "u", "h"].map(
          (name) => findVariable(unit, name).initializer,
        ),
      ).toMatchObject([
        { kind: "bool", value: "true" },
        { kind: "string", value: "hi\\n" },
        { kind: "fixed", value: "2.50" },
        { kind: "null", value: "null" },
        { kind: "int", value: "0xff" },
      ]);
    });

    it("reads nested initializer lists with a trailing comma", () => {
      expect(initializerOf("int[2][2] v = {{1, 2}, {3, 4},};")).toMatchObject({
        type: "InitializerExpression",
        elements: [
          { type: "InitializerExpression", elements: [{}, {}] },
          { type: "InitializerExpression", elements: [{}, {}] },
        ],
      });
    });
  });

  describe("locations", () => {
    it("records where each node starts", () => {
      const unit = parseUnit("int x;\n  int y = 1 +\n 2;");

      const y = findVariable(unit, "y");
      expect(y.loc).toEqual({ offset: 9, line: 2, column: 3 });
      expect(y.initializer?.loc).toMatchObject({ line: 2, column: 11 });
    });
  });

  describe("errors", () => {
    it("reports a missing token", () => {
      const error = parseError("int x = 1\nint y;");

      expect(error.message).toBe("Expected ';' but found 'int'");
      expect(error.expected).toEqual([";"]);
      expect(error.location).toMatchObject({ line: 2, column: 1 });
    });

    it("reports the end of input", () => {
      expect(parseError("int x").message).toBe(
        "Expected ';' but found end of input",
      );
      expect(parseError("void f() {").message).toBe(
        "Expected '}' but found end of input",
      );
    });

    it("reports a missing name", () => {
      const error = parseError("int = 1;");

      expect(error.message).toBe("Expected a declaration name but found '='");
      expect(error.expected).toEqual(["identifier"]);
    });

    it("reports a missing expression", () => {
      const error = parseError("void f() { return +; }");

      expect(error.message).toBe("Expected an expression but found ';'");
      expect(error.expected).toEqual(["expression"]);
    });

    it("rejects a declaration as the body of a statement", () => {
      expect(parseError("void f() { if (x) int y; }").message).toBe(
        "A declaration is not allowed here; wrap it in a block",
      );
    });

    it("rejects an include without a path", () => {
      expect(parseError("include 5").message).toBe(
        "Expected an include path but found '5'",
      );
    });

    it("passes lexer errors through", () => {
      expect(parseError("int x = 1 @ 2;").message).toBe(
        "Unexpected character '@'",
      );
    });
  });

  it("produces the same tree for the same source", () => {
    const source = "int f(int a) { return a * 2; }";

    expect(parseUnit(source)).toEqual(parseUnit(source));
  });
});
