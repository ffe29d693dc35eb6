import * as Ast from "#ast";
import type { Visitor } from "#ast";
import {
  Type,
  canAssign,
  commonType,
  isArithmetic,
  isInt,
  resolveBinaryOp,
  unwrap,
} from "#types";
import { ErrorCode, ErrorMessages } from "#diagnostics";

import type { Context } from "./context.js";
import { resolveType } from "./declarations.js";
import { checkCondition } from "./statements.js";

const COMPOUND_OPERATORS: Record<
  Exclude<Ast.Expression.AssignmentOperator, "=">,
  Ast.Expression.BinaryOperator
> = {
  "+=": "+",
  "-=": "-",
  "*=": "*",
  "/=": "/",
  "%=": "%",
  "&=": "&",
  "|=": "|",
  "^=": "^",
  "<<=": "<<",
  ">>=": ">>",
};

const LITERAL_TYPES: Record<Ast.Expression.Literal.Kind, Type> = {
  int: Type.Basic.int,
  fixed: Type.Basic.fixed,
  bool: Type.Basic.bool,
  string: Type.Basic.string,
  null: Type.Null.instance,
};

/**
 * Identifiers name a storage location unless they are bound to a function
 * or a type; element and member accesses always do
 */
function isAssignable(node: Ast.Expression, context: Context): boolean {
  switch (node.type) {
    case "IdentifierExpression": {
      const symbol = context.bindings.get(node);
      return !symbol || (symbol.kind !== "function" && symbol.kind !== "type");
    }
    case "AccessExpression":
      return true;
    default:
      return false;
  }
}

function describeCallee(node: Ast.Expression): string {
  return node.type === "IdentifierExpression" ? node.name : "expression";
}

/**
 * Type checker for expression nodes.
 * Each method computes, records and returns the type of its expression;
 * faults yield `Failure` so that enclosing expressions stay quiet.
 */
export const expressionChecker: Pick<
  Visitor<Type, Context>,
  | "identifierExpression"
  | "literalExpression"
  | "operatorExpression"
  | "conditionalExpression"
  | "assignmentExpression"
  | "castExpression"
  | "callExpression"
  | "accessExpression"
  | "sequenceExpression"
  | "initializerExpression"
> = {
  identifierExpression(
    node: Ast.Expression.Identifier,
    context: Context,
  ): Type {
    const symbol = context.symbols.lookup(node.name);
    if (!symbol) {
      // may be provided by a unit this analysis cannot see
      context.warning(
        ErrorCode.UNDECLARED_IDENTIFIER,
        ErrorMessages.UNDECLARED_IDENTIFIER(node.name),
        node.loc,
        "it may be declared in an included file",
      );
      return context.record(node, new Type.Failure(`undeclared ${node.name}`));
    }

    context.bindings.set(node, symbol);
    return context.record(node, symbol.type);
  },

  literalExpression(node: Ast.Expression.Literal, context: Context): Type {
    return context.record(node, LITERAL_TYPES[node.kind]);
  },

  operatorExpression(node: Ast.Expression.Operator, context: Context): Type {
    if (Ast.Expression.Operator.isUnary(node)) {
      return context.record(node, checkUnary(node, context));
    }

    const [left, right] = node.operands;
    const leftType = context.check(left);
    const rightType = context.check(right);

    const result = resolveBinaryOp(node.operator, leftType, rightType);
    if (!result) {
      context.error(
        ErrorCode.INVALID_OPERANDS,
        ErrorMessages.INVALID_OPERANDS(
          node.operator,
          leftType.toString(),
          rightType.toString(),
        ),
        node.loc,
      );
      return context.record(node, new Type.Failure());
    }
    return context.record(node, result);
  },

  conditionalExpression(
    node: Ast.Expression.Conditional,
    context: Context,
  ): Type {
    checkCondition(node.condition, "?:", context);

    const consequent = context.check(node.consequent);
    const alternate = context.check(node.alternate);

    const result = commonType(consequent, alternate);
    if (!result) {
      context.error(
        ErrorCode.INCOMPATIBLE_BRANCHES,
        ErrorMessages.INCOMPATIBLE_BRANCHES(
          consequent.toString(),
          alternate.toString(),
        ),
        node.loc,
      );
      return context.record(node, new Type.Failure());
    }
    return context.record(node, result);
  },

  assignmentExpression(
    node: Ast.Expression.Assignment,
    context: Context,
  ): Type {
    const targetType = context.check(node.target);
    const valueType = context.check(node.value);

    if (!isAssignable(node.target, context)) {
      context.error(
        ErrorCode.INVALID_ASSIGNMENT_TARGET,
        ErrorMessages.INVALID_ASSIGNMENT_TARGET,
        node.target.loc,
      );
    } else if (node.target.type === "IdentifierExpression") {
      const symbol = context.bindings.get(node.target);
      if (symbol?.isConst) {
        context.error(
          ErrorCode.ASSIGNMENT_TO_CONST,
          ErrorMessages.ASSIGNMENT_TO_CONST(symbol.name),
          node.target.loc,
        );
      }
    }

    if (node.operator === "=") {
      if (!canAssign(targetType, valueType)) {
        context.error(
          ErrorCode.TYPE_MISMATCH,
          ErrorMessages.ASSIGNMENT_MISMATCH(
            valueType.toString(),
            targetType.toString(),
          ),
          node.loc,
        );
      }
      return context.record(node, targetType);
    }

    const operator = COMPOUND_OPERATORS[node.operator];
    const result = resolveBinaryOp(operator, targetType, valueType);
    if (!result) {
      context.error(
        ErrorCode.INVALID_OPERANDS,
        ErrorMessages.INVALID_OPERANDS(
          node.operator,
          targetType.toString(),
          valueType.toString(),
        ),
        node.loc,
      );
    } else if (!canAssign(targetType, result)) {
      context.error(
        ErrorCode.TYPE_MISMATCH,
        ErrorMessages.COMPOUND_ASSIGNMENT_MISMATCH(
          node.operator,
          result.toString(),
          targetType.toString(),
        ),
        node.loc,
      );
    }
    return context.record(node, targetType);
  },

  castExpression(node: Ast.Expression.Cast, context: Context): Type {
    const sourceType = context.check(node.expression);
    const targetType = resolveType(node.targetType, context);

    // explicit casts are always accepted; only unusual ones are flagged
    if (!canAssign(targetType, sourceType)) {
      context.warning(
        ErrorCode.UNSAFE_CAST,
        ErrorMessages.UNSAFE_CAST(sourceType.toString(), targetType.toString()),
        node.loc,
      );
    }
    return context.record(node, targetType);
  },

  callExpression(node: Ast.Expression.Call, context: Context): Type {
    const calleeType = unwrap(context.check(node.callee));
    const argumentTypes = node.arguments.map((argument) =>
      context.check(argument),
    );

    if (Type.isFailure(calleeType)) {
      return context.record(node, calleeType);
    }

    if (!Type.isFunction(calleeType)) {
      context.error(
        ErrorCode.NOT_CALLABLE,
        ErrorMessages.NOT_CALLABLE(describeCallee(node.callee)),
        node.callee.loc,
      );
      return context.record(node, new Type.Failure());
    }

    const { parameterTypes, returnType } = calleeType;
    if (argumentTypes.length !== parameterTypes.length) {
      context.error(
        ErrorCode.ARGUMENT_COUNT,
        ErrorMessages.ARGUMENT_COUNT(
          describeCallee(node.callee),
          parameterTypes.length,
          argumentTypes.length,
        ),
        node.loc,
      );
      return context.record(node, returnType);
    }

    for (let i = 0; i < argumentTypes.length; i++) {
      if (!canAssign(parameterTypes[i], argumentTypes[i])) {
        context.error(
          ErrorCode.ARGUMENT_TYPE,
          ErrorMessages.ARGUMENT_TYPE(
            i + 1,
            parameterTypes[i].toString(),
            argumentTypes[i].toString(),
          ),
          node.arguments[i].loc,
        );
      }
    }

    // the declared return type survives an argument fault
    return context.record(node, returnType);
  },

  accessExpression(node: Ast.Expression.Access, context: Context): Type {
    const objectType = context.check(node.object);

    if (node.kind === "index") {
      const indexType = context.check(node.index);
      if (!isInt(indexType) && !Type.isFailure(unwrap(indexType))) {
        context.error(
          ErrorCode.INVALID_INDEX,
          ErrorMessages.INVALID_INDEX(indexType.toString()),
          node.index.loc,
        );
      }

      const arrayType = unwrap(objectType);
      if (Type.isArray(arrayType)) {
        return context.record(node, arrayType.elementType);
      }
      if (Type.isFailure(arrayType)) {
        return context.record(node, arrayType);
      }
      context.error(
        ErrorCode.NOT_INDEXABLE,
        ErrorMessages.NOT_INDEXABLE(objectType.toString()),
        node.object.loc,
      );
      return context.record(node, new Type.Failure());
    }

    const structType = unwrap(objectType);
    if (Type.isFailure(structType)) {
      return context.record(node, structType);
    }
    if (!Type.isStruct(structType)) {
      context.error(
        ErrorCode.NOT_A_STRUCT,
        ErrorMessages.NOT_A_STRUCT(objectType.toString()),
        node.object.loc,
      );
      return context.record(node, new Type.Failure());
    }
    if (!structType.isComplete()) {
      context.error(
        ErrorCode.INCOMPLETE_STRUCT,
        ErrorMessages.INCOMPLETE_STRUCT(structType.name),
        node.loc,
      );
      return context.record(node, new Type.Failure());
    }

    const memberType = structType.getMemberType(node.property);
    if (!memberType) {
      context.error(
        ErrorCode.NO_SUCH_MEMBER,
        ErrorMessages.NO_SUCH_MEMBER(structType.name, node.property),
        node.loc,
      );
      return context.record(node, new Type.Failure());
    }
    return context.record(node, memberType);
  },

  sequenceExpression(node: Ast.Expression.Sequence, context: Context): Type {
    let type: Type = Type.Basic.void_;
    for (const expression of node.expressions) {
      type = context.check(expression);
    }
    return context.record(node, type);
  },

  initializerExpression(
    node: Ast.Expression.Initializer,
    context: Context,
  ): Type {
    for (const element of node.elements) {
      context.check(element);
    }
    // TODO: check elements against the declared element type; the list is
    // typed only by the declaration that owns it
    return context.record(node, new Type.Failure("initializer list"));
  },
};

function checkUnary(node: Ast.Expression.Operator.Unary, context: Context): Type {
  const operandType = context.check(node.operands[0]);
  if (Type.isFailure(unwrap(operandType))) {
    return operandType;
  }

  switch (node.operator) {
    case "+":
    case "-":
      if (isArithmetic(operandType)) {
        return operandType;
      }
      break;
    case "!":
      if (canAssign(Type.Basic.bool, operandType)) {
        return Type.Basic.bool;
      }
      break;
    case "~":
      if (isInt(operandType)) {
        return Type.Basic.int;
      }
      break;
  }

  context.error(
    ErrorCode.INVALID_OPERAND,
    ErrorMessages.INVALID_OPERAND(node.operator, operandType.toString()),
    node.operands[0].loc,
  );
  return new Type.Failure();
}
