/**
 * Tokenizer for Galaxy script
 */

import type { SourceLocation } from "#ast";
import { ParseError } from "./errors.js";

export type TokenKind =
  | "identifier"
  | "keyword"
  | "int"
  | "fixed"
  | "string"
  | "punctuator"
  | "eof";

export interface Token {
  kind: TokenKind;
  value: string;
  loc: SourceLocation;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  "include",
  "const",
  "static",
  "native",
  "struct",
  "typedef",
  "if",
  "else",
  "while",
  "do",
  "for",
  "return",
  "break",
  "continue",
  "breakpoint",
  "true",
  "false",
  "null",
]);

// Longest first, so that a prefix never wins over the full operator
const PUNCTUATORS = [
  "<<=",
  ">>=",
  "<<",
  ">>",
  "<=",
  ">=",
  "==",
  "!=",
  "&&",
  "||",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "+",
  "-",
  "*",
  "/",
  "%",
  "<",
  ">",
  "=",
  "!",
  "~",
  "&",
  "|",
  "^",
  "?",
  ":",
  ";",
  ",",
  ".",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
];

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const HEX_DIGIT = /[0-9A-Fa-f]/;

export class Lexer {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.kind === "eof") {
        return tokens;
      }
    }
  }

  private next(): Token {
    this.skipTrivia();

    const loc = this.location();
    const char = this.peek();

    if (char === "") {
      return { kind: "eof", value: "", loc };
    }

    if (char === "#") {
      // `#include` is spelled with or without the hash
      this.advance();
      const word = this.readWhile(IDENTIFIER_PART);
      if (word !== "include") {
        throw new ParseError(`Unknown directive '#${word}'`, loc, ["include"]);
      }
      return { kind: "keyword", value: "include", loc };
    }

    if (IDENTIFIER_START.test(char)) {
      const word = this.readWhile(IDENTIFIER_PART);
      return {
        kind: KEYWORDS.has(word) ? "keyword" : "identifier",
        value: word,
        loc,
      };
    }

    if (DIGIT.test(char) || (char === "." && DIGIT.test(this.peek(1)))) {
      return this.number(loc);
    }

    if (char === '"') {
      return this.string(loc);
    }

    for (const punctuator of PUNCTUATORS) {
      if (this.source.startsWith(punctuator, this.offset)) {
        this.advance(punctuator.length);
        return { kind: "punctuator", value: punctuator, loc };
      }
    }

    throw new ParseError(`Unexpected character '${char}'`, loc);
  }

  private number(loc: SourceLocation): Token {
    if (this.peek() === "0" && (this.peek(1) === "x" || this.peek(1) === "X")) {
      this.advance(2);
      const digits = this.readWhile(HEX_DIGIT);
      if (!digits) {
        throw new ParseError("Malformed hexadecimal literal", loc);
      }
      return { kind: "int", value: `0x${digits}`, loc };
    }

    const whole = this.readWhile(DIGIT);
    if (this.peek() !== ".") {
      return { kind: "int", value: whole, loc };
    }
    this.advance();
    const fraction = this.readWhile(DIGIT);
    return { kind: "fixed", value: `${whole}.${fraction}`, loc };
  }

  private string(loc: SourceLocation): Token {
    this.advance(); // opening quote
    let value = "";
    for (;;) {
      const char = this.peek();
      if (char === "" || char === "\n") {
        throw new ParseError("Unterminated string literal", loc, ['"']);
      }
      if (char === '"') {
        this.advance();
        return { kind: "string", value, loc };
      }
      if (char === "\\") {
        value += char + this.peek(1);
        this.advance(2);
        continue;
      }
      value += char;
      this.advance();
    }
  }

  private skipTrivia(): void {
    for (;;) {
      const char = this.peek();
      if (char === " " || char === "\t" || char === "\r" || char === "\n") {
        this.advance();
      } else if (char === "/" && this.peek(1) === "/") {
        while (this.peek() !== "" && this.peek() !== "\n") {
          this.advance();
        }
      } else if (char === "/" && this.peek(1) === "*") {
        const start = this.location();
        this.advance(2);
        while (!(this.peek() === "*" && this.peek(1) === "/")) {
          if (this.peek() === "") {
            throw new ParseError("Unterminated comment", start, ["*/"]);
          }
          this.advance();
        }
        this.advance(2);
      } else {
        return;
      }
    }
  }

  private readWhile(pattern: RegExp): string {
    const start = this.offset;
    while (this.peek() !== "" && pattern.test(this.peek())) {
      this.advance();
    }
    return this.source.slice(start, this.offset);
  }

  private peek(ahead = 0): string {
    return this.source.charAt(this.offset + ahead);
  }

  private advance(count = 1): void {
    for (let i = 0; i < count && this.offset < this.source.length; i++) {
      if (this.source[this.offset] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.offset++;
    }
  }

  private location(): SourceLocation {
    return { offset: this.offset, line: this.line, column: this.column };
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
