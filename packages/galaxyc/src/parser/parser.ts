/**
 * Recursive-descent parser for Galaxy script
 *
 * Produces the AST directly from the token stream. Binary operators are
 * parsed by precedence climbing.
 */

import * as Ast from "#ast";
import { BUILTIN_TYPES } from "#types";
import { Result } from "#result";

import { ParseError } from "./errors.js";
import { tokenize, type Token } from "./lexer.js";

type Modifiers = { isStatic: boolean; isConst: boolean };

const BINARY_PRECEDENCE: Record<Ast.Expression.BinaryOperator, number> = {
  "||": 1,
  "&&": 2,
  "|": 3,
  "^": 4,
  "&": 5,
  "==": 6,
  "!=": 6,
  "<": 7,
  ">": 7,
  "<=": 7,
  ">=": 7,
  "<<": 8,
  ">>": 8,
  "+": 9,
  "-": 9,
  "*": 10,
  "/": 10,
  "%": 10,
};

const UNARY_OPERATORS: ReadonlySet<string> =
  new Set<Ast.Expression.UnaryOperator>(["+", "-", "!", "~"]);

const ASSIGNMENT_OPERATORS: ReadonlySet<string> =
  new Set<Ast.Expression.AssignmentOperator>([
    "=",
    "+=",
    "-=",
    "*=",
    "/=",
    "%=",
    "&=",
    "|=",
    "^=",
    "<<=",
    ">>=",
  ]);

const isBinaryOperator = (
  value: string,
): value is Ast.Expression.BinaryOperator =>
  Object.hasOwn(BINARY_PRECEDENCE, value);

const isUnaryOperator = (
  value: string,
): value is Ast.Expression.UnaryOperator => UNARY_OPERATORS.has(value);

const isAssignmentOperator = (
  value: string,
): value is Ast.Expression.AssignmentOperator =>
  ASSIGNMENT_OPERATORS.has(value);

// Tokens after `( name )` that only an operand can follow
const OPERAND_ONLY_STARTS = new Set(["!", "~"]);
// Tokens after `( name )` that could also continue an expression
const AMBIGUOUS_OPERAND_STARTS = new Set(["(", "-", "+"]);
const LITERAL_KEYWORDS = new Set(["true", "false", "null"]);

function describe(token: Token): string {
  switch (token.kind) {
    case "eof":
      return "end of input";
    case "string":
      return `"${token.value}"`;
    default:
      return `'${token.value}'`;
  }
}

/**
 * Struct and typedef names declared anywhere in the token stream, so that
 * casts to types declared further down are recognized
 */
function declaredTypeNames(tokens: Token[]): Set<string> {
  const names = new Set<string>(BUILTIN_TYPES.keys());

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== "keyword") {
      continue;
    }

    if (token.value === "struct" && tokens[i + 1]?.kind === "identifier") {
      names.add(tokens[i + 1].value);
    } else if (token.value === "typedef") {
      // the alias is the last identifier outside brackets before ';'
      let depth = 0;
      let alias: string | undefined;
      for (let j = i + 1; j < tokens.length; j++) {
        const { kind, value } = tokens[j];
        if (kind === "eof" || (kind === "punctuator" && value === ";")) {
          break;
        }
        if (kind === "punctuator" && value === "[") {
          depth++;
        } else if (kind === "punctuator" && value === "]") {
          depth--;
        } else if (kind === "identifier" && depth === 0) {
          alias = value;
        }
      }
      if (alias !== undefined) {
        names.add(alias);
      }
    }
  }

  return names;
}

export class Parser {
  private readonly tokens: Token[];
  private position = 0;

  /**
   * The built-in type names plus every struct and typedef declared
   * anywhere in the file
   */
  private readonly typeNames: ReadonlySet<string>;

  constructor(source: string) {
    this.tokens = tokenize(source);
    this.typeNames = declaredTypeNames(this.tokens);
  }

  parseUnit(): Ast.TranslationUnit {
    const start = this.peek().loc;
    const items: Ast.TopLevel[] = [];
    while (this.peek().kind !== "eof") {
      items.push(...this.topLevel());
    }
    return Ast.translationUnit(items, start);
  }

  // Top level

  private topLevel(): Ast.TopLevel[] {
    if (this.maybe(";")) {
      return [];
    }
    if (this.isKeyword("include")) {
      return [this.include()];
    }
    if (this.isKeyword("struct")) {
      return [this.struct()];
    }
    if (this.isKeyword("typedef")) {
      return [this.typedef()];
    }
    if (this.isKeyword("native")) {
      return [this.native()];
    }

    const start = this.peek().loc;
    const modifiers = this.modifiers();
    const declaredType = this.typeSpecifier();
    const name = this.expectIdentifier("a declaration name");
    if (this.isPunctuator("(")) {
      return [this.function_(name, declaredType, modifiers, start)];
    }
    return this.declarators(name, declaredType, modifiers, start);
  }

  private include(): Ast.IncludeDirective {
    const start = this.advance().loc;
    const path = this.peek();
    if (path.kind !== "string") {
      throw new ParseError(
        `Expected an include path but found ${describe(path)}`,
        path.loc,
        ["string"],
      );
    }
    this.advance();
    this.maybe(";");
    return Ast.includeDirective(path.value, start);
  }

  private struct(): Ast.Declaration.Struct {
    const start = this.advance().loc;
    const name = this.expectIdentifier("a struct name");

    this.expect("{");
    const members: Ast.Declaration.Member[] = [];
    while (!this.maybe("}")) {
      const declaredType = this.typeSpecifier();
      do {
        const member = this.expectIdentifier("a member name");
        members.push(
          Ast.Declaration.member(
            member.value,
            this.withDimensions(declaredType, this.dimensions()),
            member.loc,
          ),
        );
      } while (this.maybe(","));
      this.expect(";");
    }
    this.expect(";");

    return Ast.Declaration.struct(name.value, members, start);
  }

  private typedef(): Ast.Declaration.Typedef {
    const start = this.advance().loc;
    const declaredType = this.typeSpecifier();
    const name = this.expectIdentifier("a typedef name");
    const dimensions = this.dimensions();
    this.expect(";");

    return Ast.Declaration.typedef(
      name.value,
      this.withDimensions(declaredType, dimensions),
      start,
    );
  }

  private native(): Ast.Declaration.Function {
    const start = this.advance().loc;
    const returnType = this.typeSpecifier();
    const name = this.expectIdentifier("a function name");
    const parameters = this.parameters();
    this.expect(";");

    return Ast.Declaration.function_(
      name.value,
      returnType,
      parameters,
      undefined,
      { isNative: true },
      start,
    );
  }

  private function_(
    name: Token,
    returnType: Ast.TypeSpecifier,
    modifiers: Modifiers,
    start: Ast.SourceLocation,
  ): Ast.Declaration.Function {
    const parameters = this.parameters();
    const body = this.maybe(";") ? undefined : this.block();

    return Ast.Declaration.function_(
      name.value,
      returnType,
      parameters,
      body,
      { isStatic: modifiers.isStatic },
      start,
    );
  }

  private parameters(): Ast.Declaration.Parameter[] {
    this.expect("(");
    if (this.maybe(")")) {
      return [];
    }
    // `(void)` is an empty list
    if (this.peek().value === "void" && this.isPunctuator(")", 1)) {
      this.advance();
      this.advance();
      return [];
    }

    const parameters: Ast.Declaration.Parameter[] = [];
    do {
      const start = this.peek().loc;
      const isConst = this.maybeKeyword("const");
      const declaredType = this.typeSpecifier();
      const name = this.expectIdentifier("a parameter name");
      parameters.push(
        Ast.Declaration.parameter(
          name.value,
          this.withDimensions(declaredType, this.dimensions()),
          isConst,
          start,
        ),
      );
    } while (this.maybe(","));
    this.expect(")");

    return parameters;
  }

  /**
   * `name [dims] [= init] {, name [dims] [= init]} ;`, one declaration
   * per declarator
   */
  private declarators(
    first: Token,
    declaredType: Ast.TypeSpecifier,
    modifiers: Modifiers,
    start: Ast.SourceLocation,
  ): Ast.Declaration.Variable[] {
    const declarations = [
      this.declarator(first, declaredType, modifiers, start),
    ];
    while (this.maybe(",")) {
      const name = this.expectIdentifier("a variable name");
      declarations.push(
        this.declarator(name, declaredType, modifiers, name.loc),
      );
    }
    this.expect(";");
    return declarations;
  }

  private declarator(
    name: Token,
    declaredType: Ast.TypeSpecifier,
    modifiers: Modifiers,
    start: Ast.SourceLocation,
  ): Ast.Declaration.Variable {
    const type = this.withDimensions(declaredType, this.dimensions());
    const initializer = this.maybe("=") ? this.initializer() : undefined;

    return Ast.Declaration.variable(
      name.value,
      type,
      { initializer, ...modifiers },
      start,
    );
  }

  private initializer(): Ast.Expression {
    const start = this.peek().loc;
    if (!this.maybe("{")) {
      return this.assignment();
    }

    const elements: Ast.Expression[] = [];
    while (!this.maybe("}")) {
      elements.push(this.initializer());
      if (!this.maybe(",")) {
        this.expect("}");
        break;
      }
    }
    return Ast.Expression.initializer(elements, start);
  }

  private modifiers(): Modifiers {
    const modifiers = { isStatic: false, isConst: false };
    for (;;) {
      if (this.maybeKeyword("static")) {
        modifiers.isStatic = true;
      } else if (this.maybeKeyword("const")) {
        modifiers.isConst = true;
      } else {
        return modifiers;
      }
    }
  }

  private typeSpecifier(): Ast.TypeSpecifier {
    const name = this.expectIdentifier("a type name");
    return Ast.typeSpecifier(name.value, this.dimensions(), name.loc);
  }

  private dimensions(): (Ast.Expression | null)[] {
    const dimensions: (Ast.Expression | null)[] = [];
    while (this.maybe("[")) {
      if (this.maybe("]")) {
        dimensions.push(null);
        continue;
      }
      dimensions.push(this.expression());
      this.expect("]");
    }
    return dimensions;
  }

  /**
   * Every declarator gets its own specifier, since dimensions written
   * after a name belong to that name only
   */
  private withDimensions(
    declaredType: Ast.TypeSpecifier,
    dimensions: (Ast.Expression | null)[],
  ): Ast.TypeSpecifier {
    return Ast.typeSpecifier(
      declaredType.name,
      [...declaredType.dimensions, ...dimensions],
      declaredType.loc ?? undefined,
    );
  }

  // Statements

  private block(): Ast.Block {
    const start = this.expect("{").loc;
    const items: Ast.Statement[] = [];
    while (!this.maybe("}")) {
      if (this.peek().kind === "eof") {
        throw new ParseError(
          "Expected '}' but found end of input",
          this.peek().loc,
          ["}"],
        );
      }
      items.push(...this.blockItem());
    }
    return Ast.block(items, start);
  }

  private blockItem(): Ast.Statement[] {
    if (!this.isDeclarationStart()) {
      return [this.statement()];
    }

    const start = this.peek().loc;
    const modifiers = this.modifiers();
    const declaredType = this.typeSpecifier();
    const name = this.expectIdentifier("a variable name");
    return this.declarators(name, declaredType, modifiers, start).map(
      (declaration) => Ast.Statement.declare(declaration),
    );
  }

  private statement(): Ast.Statement {
    const token = this.peek();
    const { ControlFlow } = Ast.Statement;

    if (this.isPunctuator("{")) {
      return this.block();
    }
    if (this.maybe(";")) {
      return Ast.Statement.express(undefined, token.loc);
    }
    if (this.isDeclarationStart()) {
      throw new ParseError(
        "A declaration is not allowed here; wrap it in a block",
        token.loc,
        ["statement"],
      );
    }

    if (token.kind === "keyword") {
      switch (token.value) {
        case "if": {
          this.advance();
          const condition = this.parenthesized();
          const body = this.statement();
          const alternate = this.maybeKeyword("else")
            ? this.statement()
            : undefined;
          return ControlFlow.if_(condition, body, alternate, token.loc);
        }

        case "while": {
          this.advance();
          const condition = this.parenthesized();
          return ControlFlow.while_(condition, this.statement(), token.loc);
        }

        case "do": {
          this.advance();
          const body = this.statement();
          this.expectKeyword("while");
          const condition = this.parenthesized();
          this.expect(";");
          return ControlFlow.doWhile(body, condition, token.loc);
        }

        case "for":
          return this.for_();

        case "return": {
          this.advance();
          const value = this.isPunctuator(";") ? undefined : this.expression();
          this.expect(";");
          return ControlFlow.return_(value, token.loc);
        }

        case "break":
          this.advance();
          this.expect(";");
          return ControlFlow.break_(token.loc);

        case "continue":
          this.advance();
          this.expect(";");
          return ControlFlow.continue_(token.loc);

        case "breakpoint":
          this.advance();
          this.expect(";");
          return ControlFlow.breakpoint(token.loc);
      }
    }

    const expression = this.expression();
    this.expect(";");
    return Ast.Statement.express(expression, token.loc);
  }

  private for_(): Ast.Statement.ControlFlow.For {
    const start = this.advance().loc;
    this.expect("(");

    let init: Ast.Statement.Declare | Ast.Statement.Express | undefined;
    if (this.isDeclarationStart()) {
      const declarationStart = this.peek().loc;
      const modifiers = this.modifiers();
      const declaredType = this.typeSpecifier();
      const name = this.expectIdentifier("a variable name");
      init = Ast.Statement.declare(
        this.declarator(name, declaredType, modifiers, declarationStart),
      );
    } else if (!this.isPunctuator(";")) {
      const initStart = this.peek().loc;
      init = Ast.Statement.express(this.expression(), initStart);
    }
    this.expect(";");

    const condition = this.isPunctuator(";") ? undefined : this.expression();
    this.expect(";");
    const update = this.isPunctuator(")") ? undefined : this.expression();
    this.expect(")");

    return Ast.Statement.ControlFlow.for_(
      { init, condition, update },
      this.statement(),
      start,
    );
  }

  /**
   * Declarations open with a modifier, or with a type name followed
   * (after any dimensions) by the declared name
   */
  private isDeclarationStart(): boolean {
    if (this.isKeyword("static") || this.isKeyword("const")) {
      return true;
    }
    if (this.peek().kind !== "identifier") {
      return false;
    }

    let ahead = 1;
    while (this.isPunctuator("[", ahead)) {
      let depth = 0;
      do {
        const token = this.peek(ahead);
        if (token.kind === "eof") {
          return false;
        }
        if (token.kind === "punctuator" && token.value === "[") {
          depth++;
        } else if (token.kind === "punctuator" && token.value === "]") {
          depth--;
        }
        ahead++;
      } while (depth > 0);
    }
    return this.peek(ahead).kind === "identifier";
  }

  private parenthesized(): Ast.Expression {
    this.expect("(");
    const expression = this.expression();
    this.expect(")");
    return expression;
  }

  // Expressions

  private expression(): Ast.Expression {
    const start = this.peek().loc;
    const first = this.assignment();
    if (!this.isPunctuator(",")) {
      return first;
    }

    const expressions = [first];
    while (this.maybe(",")) {
      expressions.push(this.assignment());
    }
    return Ast.Expression.sequence(expressions, start);
  }

  private assignment(): Ast.Expression {
    const start = this.peek().loc;
    const target = this.conditional();

    const operator = this.punctuator();
    if (!isAssignmentOperator(operator)) {
      return target;
    }
    this.advance();
    // right-associative
    const value = this.assignment();
    return Ast.Expression.assignment(operator, target, value, start);
  }

  private conditional(): Ast.Expression {
    const start = this.peek().loc;
    const condition = this.binary(1);
    if (!this.maybe("?")) {
      return condition;
    }

    const consequent = this.expression();
    this.expect(":");
    const alternate = this.conditional();
    return Ast.Expression.conditional(condition, consequent, alternate, start);
  }

  private binary(minPrecedence: number): Ast.Expression {
    const start = this.peek().loc;
    let left = this.unary();

    for (;;) {
      const operator = this.punctuator();
      if (
        !isBinaryOperator(operator) ||
        BINARY_PRECEDENCE[operator] < minPrecedence
      ) {
        return left;
      }
      this.advance();
      const right = this.binary(BINARY_PRECEDENCE[operator] + 1);
      left = Ast.Expression.binary(operator, left, right, start);
    }
  }

  private unary(): Ast.Expression {
    const start = this.peek().loc;

    const operator = this.punctuator();
    if (isUnaryOperator(operator)) {
      this.advance();
      return Ast.Expression.unary(operator, this.unary(), start);
    }

    if (this.isCastStart()) {
      this.advance();
      const name = this.advance();
      this.advance();
      const targetType = Ast.typeSpecifier(name.value, [], name.loc);
      return Ast.Expression.cast(targetType, this.unary(), start);
    }

    return this.postfix();
  }

  /**
   * `( name )` followed by something that can start an operand. After
   * `(`, `+` or `-` the parentheses may also close an operand, so the name
   * must then be a known type.
   */
  private isCastStart(): boolean {
    const name = this.peek(1);
    if (
      !this.isPunctuator("(") ||
      name.kind !== "identifier" ||
      !this.isPunctuator(")", 2)
    ) {
      return false;
    }

    const next = this.peek(3);
    switch (next.kind) {
      case "identifier":
      case "int":
      case "fixed":
      case "string":
        return true;
      case "keyword":
        return LITERAL_KEYWORDS.has(next.value);
      case "punctuator":
        return (
          OPERAND_ONLY_STARTS.has(next.value) ||
          (AMBIGUOUS_OPERAND_STARTS.has(next.value) &&
            this.typeNames.has(name.value))
        );
      default:
        return false;
    }
  }

  private postfix(): Ast.Expression {
    const start = this.peek().loc;
    let expression = this.primary();

    for (;;) {
      if (this.maybe("(")) {
        const args: Ast.Expression[] = [];
        if (!this.maybe(")")) {
          do {
            args.push(this.assignment());
          } while (this.maybe(","));
          this.expect(")");
        }
        expression = Ast.Expression.call(expression, args, start);
      } else if (this.maybe("[")) {
        const index = this.expression();
        this.expect("]");
        expression = Ast.Expression.index(expression, index, start);
      } else if (this.maybe(".")) {
        const property = this.expectIdentifier("a member name");
        expression = Ast.Expression.member(expression, property.value, start);
      } else {
        return expression;
      }
    }
  }

  private primary(): Ast.Expression {
    const token = this.peek();
    const { literal } = Ast.Expression;

    switch (token.kind) {
      case "identifier":
        this.advance();
        return Ast.Expression.identifier(token.value, token.loc);
      case "int":
      case "fixed":
      case "string":
        this.advance();
        return literal(token.kind, token.value, token.loc);
      case "keyword":
        if (token.value === "true" || token.value === "false") {
          this.advance();
          return literal("bool", token.value, token.loc);
        }
        if (token.value === "null") {
          this.advance();
          return literal("null", token.value, token.loc);
        }
        break;
      case "punctuator":
        if (token.value === "(") {
          return this.parenthesized();
        }
        break;
    }

    throw new ParseError(
      `Expected an expression but found ${describe(token)}`,
      token.loc,
      ["expression"],
    );
  }

  // Token helpers

  private peek(ahead = 0): Token {
    const index = Math.min(this.position + ahead, this.tokens.length - 1);
    return this.tokens[index];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== "eof") {
      this.position++;
    }
    return token;
  }

  /**
   * The current token's text when it is a punctuator, else ""
   */
  private punctuator(): string {
    const token = this.peek();
    return token.kind === "punctuator" ? token.value : "";
  }

  private isPunctuator(value: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.kind === "punctuator" && token.value === value;
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.kind === "keyword" && token.value === value;
  }

  private maybe(value: string): boolean {
    if (!this.isPunctuator(value)) {
      return false;
    }
    this.advance();
    return true;
  }

  private maybeKeyword(value: string): boolean {
    if (!this.isKeyword(value)) {
      return false;
    }
    this.advance();
    return true;
  }

  private expect(value: string): Token {
    const token = this.peek();
    if (!this.isPunctuator(value)) {
      throw new ParseError(
        `Expected '${value}' but found ${describe(token)}`,
        token.loc,
        [value],
      );
    }
    return this.advance();
  }

  private expectKeyword(value: string): Token {
    const token = this.peek();
    if (!this.isKeyword(value)) {
      throw new ParseError(
        `Expected '${value}' but found ${describe(token)}`,
        token.loc,
        [value],
      );
    }
    return this.advance();
  }

  private expectIdentifier(what: string): Token {
    const token = this.peek();
    if (token.kind !== "identifier") {
      throw new ParseError(
        `Expected ${what} but found ${describe(token)}`,
        token.loc,
        ["identifier"],
      );
    }
    return this.advance();
  }
}

/**
 * Parse Galaxy source into a translation unit
 */
export function parse(source: string): Result<Ast.TranslationUnit, ParseError> {
  try {
    return Result.ok(new Parser(source).parseUnit());
  } catch (error) {
    if (error instanceof ParseError) {
      return Result.err(error);
    }
    throw error;
  }
}
