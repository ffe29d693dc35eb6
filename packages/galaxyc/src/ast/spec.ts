/**
 * AST node types for Galaxy script
 *
 * Key principles:
 * 1. Nodes are plain data, discriminated by `type`
 * 2. Variants of one construct share a `type` and differ by `kind`
 * 3. The tree is never restructured after construction; semantic results
 *    (types, resolved symbols) live in side tables keyed by node
 */

export interface SourceLocation {
  offset: number;
  line: number;
  column: number;
}

export const isSourceLocation = (loc: unknown): loc is SourceLocation =>
  typeof loc === "object" &&
  !!loc &&
  "offset" in loc &&
  typeof loc.offset === "number" &&
  "line" in loc &&
  typeof loc.line === "number" &&
  "column" in loc &&
  typeof loc.column === "number";

export type Node =
  | TranslationUnit
  | IncludeDirective
  | TypeSpecifier
  | Declaration
  | Block
  | Statement
  | Expression;

export namespace Node {
  export interface Base {
    type: string;
    loc: SourceLocation | null;
  }

  export const isBase = (node: unknown): node is Node.Base =>
    typeof node === "object" &&
    !!node &&
    "type" in node &&
    typeof node.type === "string" &&
    !!node.type &&
    "loc" in node &&
    (node.loc === null || isSourceLocation(node.loc));
}

// Translation unit structure

export type TopLevel =
  | IncludeDirective
  | Declaration.Variable
  | Declaration.Function
  | Declaration.Struct
  | Declaration.Typedef;

export interface TranslationUnit extends Node.Base {
  type: "TranslationUnit";
  items: TopLevel[];
}

export function translationUnit(
  items: TopLevel[],
  loc?: SourceLocation,
): TranslationUnit {
  return { type: "TranslationUnit", items, loc: loc ?? null };
}

export const isTranslationUnit = (node: unknown): node is TranslationUnit =>
  Node.isBase(node) &&
  node.type === "TranslationUnit" &&
  "items" in node &&
  Array.isArray(node.items);

export interface IncludeDirective extends Node.Base {
  type: "IncludeDirective";
  path: string;
}

export function includeDirective(
  path: string,
  loc?: SourceLocation,
): IncludeDirective {
  return { type: "IncludeDirective", path, loc: loc ?? null };
}

/**
 * A named type with optional array dimensions.
 * `dimensions[0]` is the outermost dimension; `null` means the size was
 * omitted (`int[] xs`).
 */
export interface TypeSpecifier extends Node.Base {
  type: "TypeSpecifier";
  name: string;
  dimensions: (Expression | null)[];
}

export function typeSpecifier(
  name: string,
  dimensions: (Expression | null)[] = [],
  loc?: SourceLocation,
): TypeSpecifier {
  return { type: "TypeSpecifier", name, dimensions, loc: loc ?? null };
}

// Declarations

export type Declaration =
  | Declaration.Variable
  | Declaration.Function
  | Declaration.Parameter
  | Declaration.Struct
  | Declaration.Member
  | Declaration.Typedef;

export namespace Declaration {
  export interface Base extends Node.Base {
    type: "Declaration";
    kind: string;
    name: string;
  }

  export interface Variable extends Declaration.Base {
    kind: "variable";
    declaredType: TypeSpecifier;
    initializer?: Expression;
    isStatic: boolean;
    isConst: boolean;
  }

  export function variable(
    name: string,
    declaredType: TypeSpecifier,
    options: {
      initializer?: Expression;
      isStatic?: boolean;
      isConst?: boolean;
    } = {},
    loc?: SourceLocation,
  ): Declaration.Variable {
    return {
      type: "Declaration",
      kind: "variable",
      name,
      declaredType,
      initializer: options.initializer,
      isStatic: options.isStatic ?? false,
      isConst: options.isConst ?? false,
      loc: loc ?? null,
    };
  }

  /**
   * A function prototype (no body), native declaration or definition
   */
  export interface Function extends Declaration.Base {
    kind: "function";
    returnType: TypeSpecifier;
    parameters: Declaration.Parameter[];
    body?: Block;
    isStatic: boolean;
    isNative: boolean;
  }

  export function function_(
    name: string,
    returnType: TypeSpecifier,
    parameters: Declaration.Parameter[],
    body: Block | undefined,
    options: { isStatic?: boolean; isNative?: boolean } = {},
    loc?: SourceLocation,
  ): Declaration.Function {
    return {
      type: "Declaration",
      kind: "function",
      name,
      returnType,
      parameters,
      body,
      isStatic: options.isStatic ?? false,
      isNative: options.isNative ?? false,
      loc: loc ?? null,
    };
  }

  export interface Parameter extends Declaration.Base {
    kind: "parameter";
    declaredType: TypeSpecifier;
    isConst: boolean;
  }

  export function parameter(
    name: string,
    declaredType: TypeSpecifier,
    isConst = false,
    loc?: SourceLocation,
  ): Declaration.Parameter {
    return {
      type: "Declaration",
      kind: "parameter",
      name,
      declaredType,
      isConst,
      loc: loc ?? null,
    };
  }

  export interface Struct extends Declaration.Base {
    kind: "struct";
    members: Declaration.Member[];
  }

  export function struct(
    name: string,
    members: Declaration.Member[],
    loc?: SourceLocation,
  ): Declaration.Struct {
    return {
      type: "Declaration",
      kind: "struct",
      name,
      members,
      loc: loc ?? null,
    };
  }

  export interface Member extends Declaration.Base {
    kind: "member";
    declaredType: TypeSpecifier;
  }

  export function member(
    name: string,
    declaredType: TypeSpecifier,
    loc?: SourceLocation,
  ): Declaration.Member {
    return {
      type: "Declaration",
      kind: "member",
      name,
      declaredType,
      loc: loc ?? null,
    };
  }

  export interface Typedef extends Declaration.Base {
    kind: "typedef";
    declaredType: TypeSpecifier;
  }

  export function typedef(
    name: string,
    declaredType: TypeSpecifier,
    loc?: SourceLocation,
  ): Declaration.Typedef {
    return {
      type: "Declaration",
      kind: "typedef",
      name,
      declaredType,
      loc: loc ?? null,
    };
  }

  export const isVariable = (node: Node): node is Declaration.Variable =>
    node.type === "Declaration" && node.kind === "variable";

  export const isFunction = (node: Node): node is Declaration.Function =>
    node.type === "Declaration" && node.kind === "function";

  export const isStruct = (node: Node): node is Declaration.Struct =>
    node.type === "Declaration" && node.kind === "struct";

  export const isTypedef = (node: Node): node is Declaration.Typedef =>
    node.type === "Declaration" && node.kind === "typedef";
}

// Blocks

export interface Block extends Node.Base {
  type: "Block";
  items: Statement[];
}

export function block(items: Statement[], loc?: SourceLocation): Block {
  return { type: "Block", items, loc: loc ?? null };
}

// Statements

export type Statement =
  | Block
  | Statement.Declare
  | Statement.Express
  | Statement.ControlFlow;

export namespace Statement {
  export interface Declare extends Node.Base {
    type: "DeclarationStatement";
    declaration: Declaration.Variable;
  }

  export function declare(
    declaration: Declaration.Variable,
    loc?: SourceLocation,
  ): Statement.Declare {
    return {
      type: "DeclarationStatement",
      declaration,
      loc: loc ?? declaration.loc,
    };
  }

  /**
   * Expression statement; `expression` is absent for the empty statement
   */
  export interface Express extends Node.Base {
    type: "ExpressionStatement";
    expression?: Expression;
  }

  export function express(
    expression: Expression | undefined,
    loc?: SourceLocation,
  ): Statement.Express {
    return { type: "ExpressionStatement", expression, loc: loc ?? null };
  }

  export type ControlFlow =
    | ControlFlow.If
    | ControlFlow.While
    | ControlFlow.DoWhile
    | ControlFlow.For
    | ControlFlow.Return
    | ControlFlow.Break
    | ControlFlow.Continue
    | ControlFlow.Breakpoint;

  export namespace ControlFlow {
    export interface Base extends Node.Base {
      type: "ControlFlowStatement";
    }

    export interface If extends Base {
      kind: "if";
      condition: Expression;
      body: Statement;
      alternate?: Statement;
    }

    export interface While extends Base {
      kind: "while";
      condition: Expression;
      body: Statement;
    }

    export interface DoWhile extends Base {
      kind: "do-while";
      body: Statement;
      condition: Expression;
    }

    export interface For extends Base {
      kind: "for";
      init?: Statement.Declare | Statement.Express;
      condition?: Expression;
      update?: Expression;
      body: Statement;
    }

    export interface Return extends Base {
      kind: "return";
      value?: Expression;
    }

    export interface Break extends Base {
      kind: "break";
    }

    export interface Continue extends Base {
      kind: "continue";
    }

    /**
     * Debugger trap; no semantics
     */
    export interface Breakpoint extends Base {
      kind: "breakpoint";
    }

    export const if_ = (
      condition: Expression,
      body: Statement,
      alternate?: Statement,
      loc?: SourceLocation,
    ): If => ({
      type: "ControlFlowStatement",
      kind: "if",
      condition,
      body,
      alternate,
      loc: loc ?? null,
    });

    export const while_ = (
      condition: Expression,
      body: Statement,
      loc?: SourceLocation,
    ): While => ({
      type: "ControlFlowStatement",
      kind: "while",
      condition,
      body,
      loc: loc ?? null,
    });

    export const doWhile = (
      body: Statement,
      condition: Expression,
      loc?: SourceLocation,
    ): DoWhile => ({
      type: "ControlFlowStatement",
      kind: "do-while",
      body,
      condition,
      loc: loc ?? null,
    });

    export const for_ = (
      parts: {
        init?: Statement.Declare | Statement.Express;
        condition?: Expression;
        update?: Expression;
      },
      body: Statement,
      loc?: SourceLocation,
    ): For => ({
      type: "ControlFlowStatement",
      kind: "for",
      ...parts,
      body,
      loc: loc ?? null,
    });

    export const return_ = (
      value?: Expression,
      loc?: SourceLocation,
    ): Return => ({
      type: "ControlFlowStatement",
      kind: "return",
      value,
      loc: loc ?? null,
    });

    export const break_ = (loc?: SourceLocation): Break => ({
      type: "ControlFlowStatement",
      kind: "break",
      loc: loc ?? null,
    });

    export const continue_ = (loc?: SourceLocation): Continue => ({
      type: "ControlFlowStatement",
      kind: "continue",
      loc: loc ?? null,
    });

    export const breakpoint = (loc?: SourceLocation): Breakpoint => ({
      type: "ControlFlowStatement",
      kind: "breakpoint",
      loc: loc ?? null,
    });
  }
}

// Expressions

export type Expression =
  | Expression.Identifier
  | Expression.Literal
  | Expression.Operator
  | Expression.Conditional
  | Expression.Assignment
  | Expression.Cast
  | Expression.Call
  | Expression.Access
  | Expression.Sequence
  | Expression.Initializer;

export namespace Expression {
  export interface Identifier extends Node.Base {
    type: "IdentifierExpression";
    name: string;
  }

  export function identifier(
    name: string,
    loc?: SourceLocation,
  ): Expression.Identifier {
    return { type: "IdentifierExpression", name, loc: loc ?? null };
  }

  export const isIdentifier = (node: Node): node is Expression.Identifier =>
    node.type === "IdentifierExpression";

  /**
   * Literal values keep their source spelling; string literals keep their
   * escapes and drop the surrounding quotes
   */
  export interface Literal extends Node.Base {
    type: "LiteralExpression";
    kind: Literal.Kind;
    value: string;
  }

  export namespace Literal {
    export type Kind = "int" | "fixed" | "bool" | "null" | "string";
  }

  export function literal(
    kind: Literal.Kind,
    value: string,
    loc?: SourceLocation,
  ): Expression.Literal {
    return { type: "LiteralExpression", kind, value, loc: loc ?? null };
  }

  export const isLiteral = (node: Node): node is Expression.Literal =>
    node.type === "LiteralExpression";

  export type UnaryOperator = "+" | "-" | "!" | "~";

  export type BinaryOperator =
    | "+"
    | "-"
    | "*"
    | "/"
    | "%"
    | "<<"
    | ">>"
    | "&"
    | "|"
    | "^"
    | "<"
    | ">"
    | "<="
    | ">="
    | "=="
    | "!="
    | "&&"
    | "||";

  export type Operator = Operator.Unary | Operator.Binary;

  export namespace Operator {
    export interface Unary extends Node.Base {
      type: "OperatorExpression";
      operator: UnaryOperator;
      operands: [Expression];
    }

    export interface Binary extends Node.Base {
      type: "OperatorExpression";
      operator: BinaryOperator;
      operands: [Expression, Expression];
    }

    export const isUnary = (node: Operator): node is Unary =>
      node.operands.length === 1;
  }

  export function unary(
    operator: UnaryOperator,
    operand: Expression,
    loc?: SourceLocation,
  ): Operator.Unary {
    return {
      type: "OperatorExpression",
      operator,
      operands: [operand],
      loc: loc ?? null,
    };
  }

  export function binary(
    operator: BinaryOperator,
    left: Expression,
    right: Expression,
    loc?: SourceLocation,
  ): Operator.Binary {
    return {
      type: "OperatorExpression",
      operator,
      operands: [left, right],
      loc: loc ?? null,
    };
  }

  export interface Conditional extends Node.Base {
    type: "ConditionalExpression";
    condition: Expression;
    consequent: Expression;
    alternate: Expression;
  }

  export function conditional(
    condition: Expression,
    consequent: Expression,
    alternate: Expression,
    loc?: SourceLocation,
  ): Expression.Conditional {
    return {
      type: "ConditionalExpression",
      condition,
      consequent,
      alternate,
      loc: loc ?? null,
    };
  }

  export type AssignmentOperator =
    | "="
    | "+="
    | "-="
    | "*="
    | "/="
    | "%="
    | "&="
    | "|="
    | "^="
    | "<<="
    | ">>=";

  export interface Assignment extends Node.Base {
    type: "AssignmentExpression";
    operator: AssignmentOperator;
    target: Expression;
    value: Expression;
  }

  export function assignment(
    operator: AssignmentOperator,
    target: Expression,
    value: Expression,
    loc?: SourceLocation,
  ): Expression.Assignment {
    return {
      type: "AssignmentExpression",
      operator,
      target,
      value,
      loc: loc ?? null,
    };
  }

  export interface Cast extends Node.Base {
    type: "CastExpression";
    targetType: TypeSpecifier;
    expression: Expression;
  }

  export function cast(
    targetType: TypeSpecifier,
    expression: Expression,
    loc?: SourceLocation,
  ): Expression.Cast {
    return {
      type: "CastExpression",
      targetType,
      expression,
      loc: loc ?? null,
    };
  }

  export interface Call extends Node.Base {
    type: "CallExpression";
    callee: Expression;
    arguments: Expression[];
  }

  export function call(
    callee: Expression,
    args: Expression[],
    loc?: SourceLocation,
  ): Expression.Call {
    return {
      type: "CallExpression",
      callee,
      arguments: args,
      loc: loc ?? null,
    };
  }

  export type Access = Access.Index | Access.Member;

  export namespace Access {
    export interface Index extends Node.Base {
      type: "AccessExpression";
      kind: "index";
      object: Expression;
      index: Expression;
    }

    export interface Member extends Node.Base {
      type: "AccessExpression";
      kind: "member";
      object: Expression;
      property: string;
    }
  }

  export function index(
    object: Expression,
    index: Expression,
    loc?: SourceLocation,
  ): Access.Index {
    return {
      type: "AccessExpression",
      kind: "index",
      object,
      index,
      loc: loc ?? null,
    };
  }

  export function member(
    object: Expression,
    property: string,
    loc?: SourceLocation,
  ): Access.Member {
    return {
      type: "AccessExpression",
      kind: "member",
      object,
      property,
      loc: loc ?? null,
    };
  }

  /**
   * Comma expression; its value is that of the last element
   */
  export interface Sequence extends Node.Base {
    type: "SequenceExpression";
    expressions: Expression[];
  }

  export function sequence(
    expressions: Expression[],
    loc?: SourceLocation,
  ): Expression.Sequence {
    return { type: "SequenceExpression", expressions, loc: loc ?? null };
  }

  /**
   * Brace initializer list, `{ 1, 2, 3 }`
   */
  export interface Initializer extends Node.Base {
    type: "InitializerExpression";
    elements: Expression[];
  }

  export function initializer(
    elements: Expression[],
    loc?: SourceLocation,
  ): Expression.Initializer {
    return { type: "InitializerExpression", elements, loc: loc ?? null };
  }
}
