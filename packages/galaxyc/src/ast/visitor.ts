import type * as Ast from "./spec.js";

export interface Visitor<T, C = never> {
  translationUnit(node: Ast.TranslationUnit, context: C): T;
  includeDirective(node: Ast.IncludeDirective, context: C): T;
  typeSpecifier(node: Ast.TypeSpecifier, context: C): T;
  declaration(node: Ast.Declaration, context: C): T;
  block(node: Ast.Block, context: C): T;
  declarationStatement(node: Ast.Statement.Declare, context: C): T;
  expressionStatement(node: Ast.Statement.Express, context: C): T;
  controlFlowStatement(node: Ast.Statement.ControlFlow, context: C): T;
  identifierExpression(node: Ast.Expression.Identifier, context: C): T;
  literalExpression(node: Ast.Expression.Literal, context: C): T;
  operatorExpression(node: Ast.Expression.Operator, context: C): T;
  conditionalExpression(node: Ast.Expression.Conditional, context: C): T;
  assignmentExpression(node: Ast.Expression.Assignment, context: C): T;
  castExpression(node: Ast.Expression.Cast, context: C): T;
  callExpression(node: Ast.Expression.Call, context: C): T;
  accessExpression(node: Ast.Expression.Access, context: C): T;
  sequenceExpression(node: Ast.Expression.Sequence, context: C): T;
  initializerExpression(node: Ast.Expression.Initializer, context: C): T;
}

export function visit<T, C = never>(
  visitor: Visitor<T, C>,
  node: Ast.Node,
  context: C,
): T {
  switch (node.type) {
    case "TranslationUnit":
      return visitor.translationUnit(node, context);
    case "IncludeDirective":
      return visitor.includeDirective(node, context);
    case "TypeSpecifier":
      return visitor.typeSpecifier(node, context);
    case "Declaration":
      return visitor.declaration(node, context);
    case "Block":
      return visitor.block(node, context);
    case "DeclarationStatement":
      return visitor.declarationStatement(node, context);
    case "ExpressionStatement":
      return visitor.expressionStatement(node, context);
    case "ControlFlowStatement":
      return visitor.controlFlowStatement(node, context);
    case "IdentifierExpression":
      return visitor.identifierExpression(node, context);
    case "LiteralExpression":
      return visitor.literalExpression(node, context);
    case "OperatorExpression":
      return visitor.operatorExpression(node, context);
    case "ConditionalExpression":
      return visitor.conditionalExpression(node, context);
    case "AssignmentExpression":
      return visitor.assignmentExpression(node, context);
    case "CastExpression":
      return visitor.castExpression(node, context);
    case "CallExpression":
      return visitor.callExpression(node, context);
    case "AccessExpression":
      return visitor.accessExpression(node, context);
    case "SequenceExpression":
      return visitor.sequenceExpression(node, context);
    case "InitializerExpression":
      return visitor.initializerExpression(node, context);
    default: {
      const unreachable: never = node;
      throw new Error(`Unknown node type: ${JSON.stringify(unreachable)}`);
    }
  }
}
