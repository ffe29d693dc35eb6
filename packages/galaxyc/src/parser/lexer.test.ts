import { describe, it, expect } from "vitest";

import { ParseError } from "./errors.js";
import { tokenize } from "./lexer.js";

const summarize = (source: string) =>
  tokenize(source).map(({ kind, value }) => `${kind}:${value}`);

function lexError(source: string): ParseError {
  try {
    tokenize(source);
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected tokenizing to fail");
}

describe("tokenize", () => {
  it("splits a declaration", () => {
    expect(summarize("int x = 0x1F;")).toEqual([
      "identifier:int",
      "identifier:x",
      "punctuator:=",
      "int:0x1F",
      "punctuator:;",
      "eof:",
    ]);
  });

  it("separates keywords from identifiers", () => {
    expect(summarize("while void null breakpoint")).toEqual([
      "keyword:while",
      "identifier:void",
      "keyword:null",
      "keyword:breakpoint",
      "eof:",
    ]);
  });

  it("reads both spellings of include", () => {
    expect(summarize('#include "a"\ninclude "b"')).toEqual([
      "keyword:include",
      "string:a",
      "keyword:include",
      "string:b",
      "eof:",
    ]);
  });

  it("prefers the longest operator", () => {
    expect(summarize("a <<= 1 >= 2 != b--")).toEqual([
      "identifier:a",
      "punctuator:<<=",
      "int:1",
      "punctuator:>=",
      "int:2",
      "punctuator:!=",
      "identifier:b",
      "punctuator:-",
      "punctuator:-",
      "eof:",
    ]);
  });

  it("reads fixed literals with either part omitted", () => {
    expect(summarize("1.25 .5 3.")).toEqual([
      "fixed:1.25",
      "fixed:.5",
      "fixed:3.",
      "eof:",
    ]);
  });

  it("keeps string escapes and drops the quotes", () => {
    const [token] = tokenize('"a\\"b\\n"');

    expect(token.kind).toBe("string");
    expect(token.value).toBe('a\\"b\\n');
  });

  it("skips comments and tracks positions", () => {
    const tokens = tokenize("// note\nx /* y */ z");

    expect(tokens.map(({ value, loc }) => [value, loc.line, loc.column]))
      .toEqual([
        ["x", 2, 1],
        ["z", 2, 11],
        ["", 2, 12],
      ]);
    expect(tokens[0].loc.offset).toBe(8);
  });

  it("rejects characters outside the language", () => {
    const error = lexError("x @");

    expect(error.message).toBe("Unexpected character '@'");
    expect(error.location).toEqual({ offset: 2, line: 1, column: 3 });
  });

  it("rejects unterminated strings and comments", () => {
    const string = lexError('s = "open');
    expect(string.message).toBe("Unterminated string literal");
    expect(string.expected).toEqual(['"']);

    const comment = lexError("x /* never closed");
    expect(comment.message).toBe("Unterminated comment");
    expect(comment.expected).toEqual(["*/"]);
  });

  it("rejects other directives and malformed hex", () => {
    expect(lexError("#define X 1").message).toBe(
      "Unknown directive '#define'",
    );
    expect(lexError("0x;").message).toBe("Malformed hexadecimal literal");
  });
});
