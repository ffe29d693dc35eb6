import type * as Ast from "#ast";
import type { Visitor } from "#ast";
import { Type, canAssign, isVoid } from "#types";
import { ErrorCode, ErrorMessages } from "#diagnostics";

import type { Context } from "./context.js";
import { declareVariable } from "./declarations.js";

const NO_VALUE = Type.Basic.void_;

/**
 * Report a condition that cannot be used as a bool
 */
export function checkCondition(
  condition: Ast.Expression,
  construct: string,
  context: Context,
): void {
  const type = context.check(condition);
  if (!canAssign(Type.Basic.bool, type)) {
    context.error(
      ErrorCode.INVALID_CONDITION,
      ErrorMessages.INVALID_CONDITION(construct, type.toString()),
      condition.loc,
    );
  }
}

function checkLoopBody(body: Ast.Statement, context: Context): void {
  context.loopDepth++;
  try {
    context.check(body);
  } finally {
    context.loopDepth--;
  }
}

/**
 * Type checker for blocks and statements.
 * Statements have no value; each method returns `void`.
 */
export const statementChecker: Pick<
  Visitor<Type, Context>,
  | "block"
  | "declarationStatement"
  | "expressionStatement"
  | "controlFlowStatement"
> = {
  block(node: Ast.Block, context: Context): Type {
    context.symbols.enterBlock();
    try {
      for (const item of node.items) {
        context.check(item);
      }
    } finally {
      context.symbols.leaveScope();
    }
    return NO_VALUE;
  },

  declarationStatement(node: Ast.Statement.Declare, context: Context): Type {
    declareVariable(node.declaration, context);
    return NO_VALUE;
  },

  expressionStatement(node: Ast.Statement.Express, context: Context): Type {
    if (node.expression) {
      context.check(node.expression);
    }
    return NO_VALUE;
  },

  controlFlowStatement(
    node: Ast.Statement.ControlFlow,
    context: Context,
  ): Type {
    switch (node.kind) {
      case "if":
        checkCondition(node.condition, "if", context);
        context.check(node.body);
        if (node.alternate) {
          context.check(node.alternate);
        }
        break;

      case "while":
        checkCondition(node.condition, "while", context);
        checkLoopBody(node.body, context);
        break;

      case "do-while":
        checkLoopBody(node.body, context);
        checkCondition(node.condition, "do-while", context);
        break;

      case "for":
        // the loop gets its own scope so `init` declarations stay local
        context.symbols.enterBlock();
        try {
          if (node.init) {
            context.check(node.init);
          }
          if (node.condition) {
            checkCondition(node.condition, "for", context);
          }
          if (node.update) {
            context.check(node.update);
          }
          checkLoopBody(node.body, context);
        } finally {
          context.symbols.leaveScope();
        }
        break;

      case "return":
        checkReturn(node, context);
        break;

      case "break":
        if (context.loopDepth === 0) {
          context.error(
            ErrorCode.BREAK_OUTSIDE_LOOP,
            ErrorMessages.BREAK_OUTSIDE_LOOP,
            node.loc,
          );
        }
        break;

      case "continue":
        if (context.loopDepth === 0) {
          context.error(
            ErrorCode.CONTINUE_OUTSIDE_LOOP,
            ErrorMessages.CONTINUE_OUTSIDE_LOOP,
            node.loc,
          );
        }
        break;

      case "breakpoint":
        break;
    }

    return NO_VALUE;
  },
};

function checkReturn(
  node: Ast.Statement.ControlFlow.Return,
  context: Context,
): void {
  const frame = context.currentFunction;
  if (!frame) {
    context.error(
      ErrorCode.RETURN_OUTSIDE_FUNCTION,
      ErrorMessages.RETURN_OUTSIDE_FUNCTION,
      node.loc,
    );
    if (node.value) {
      context.check(node.value);
    }
    return;
  }

  const expected = frame.type.returnType;

  if (!node.value) {
    if (!isVoid(expected) && !Type.isFailure(expected)) {
      context.error(
        ErrorCode.MISSING_RETURN_VALUE,
        ErrorMessages.MISSING_RETURN_VALUE(frame.name, expected.toString()),
        node.loc,
      );
    }
    return;
  }

  const actual = context.check(node.value);
  if (isVoid(expected)) {
    context.error(
      ErrorCode.RETURN_VALUE_IN_VOID,
      ErrorMessages.RETURN_VALUE_IN_VOID(frame.name),
      node.loc,
    );
  } else if (!canAssign(expected, actual)) {
    context.error(
      ErrorCode.RETURN_TYPE,
      ErrorMessages.RETURN_TYPE(
        frame.name,
        expected.toString(),
        actual.toString(),
      ),
      node.value.loc,
    );
  }
}
