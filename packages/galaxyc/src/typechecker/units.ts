/**
 * Translation-unit checking: global registration, then function bodies
 */

import type * as Ast from "#ast";
import type { Visitor } from "#ast";
import { Type } from "#types";
import { ErrorCode, ErrorMessages } from "#diagnostics";
import { Result } from "#result";

import type { Context } from "./context.js";
import {
  checkFunctionBody,
  completeTypeDeclaration,
  declareFunction,
  declareTypeName,
  declareVariable,
  isResolvable,
  resolveType,
} from "./declarations.js";

/**
 * Check one translation unit against the shared global scope.
 *
 * Registration order is fixed:
 *   1. included units
 *   2. const globals whose type is already resolvable
 *   3. struct and typedef names
 *   4. struct members and typedef targets
 *   5. function signatures
 *   6. remaining globals
 * after which function bodies are checked in declaration order.
 */
export function checkUnit(unit: Ast.TranslationUnit, context: Context): void {
  const registered = new Set<Ast.Declaration.Variable>();
  const typeDeclarations: (Ast.Declaration.Struct | Ast.Declaration.Typedef)[] =
    [];
  const functions: Ast.Declaration.Function[] = [];
  const variables: Ast.Declaration.Variable[] = [];

  for (const item of unit.items) {
    if (item.type === "IncludeDirective") {
      processInclude(item, context);
    } else if (item.kind === "function") {
      functions.push(item);
    } else if (item.kind === "variable") {
      variables.push(item);
    } else {
      typeDeclarations.push(item);
    }
  }

  for (const variable of variables) {
    if (variable.isConst && isResolvable(variable.declaredType, context)) {
      declareVariable(variable, context);
      registered.add(variable);
    }
  }

  for (const declaration of typeDeclarations) {
    declareTypeName(declaration, context);
  }
  for (const declaration of typeDeclarations) {
    completeTypeDeclaration(declaration, context);
  }

  for (const declaration of functions) {
    declareFunction(declaration, context);
  }

  for (const variable of variables) {
    if (!registered.has(variable)) {
      declareVariable(variable, context);
    }
  }

  for (const declaration of functions) {
    checkFunctionBody(declaration, context);
  }
}

/**
 * Analyze an included unit in place, under its own source name
 */
function processInclude(
  directive: Ast.IncludeDirective,
  context: Context,
): void {
  const { loadSource, parse } = context;
  if (!loadSource || !parse) {
    return;
  }

  const loaded = loadSource(directive.path);
  if (loaded === undefined) {
    context.warning(
      ErrorCode.INCLUDE_NOT_FOUND,
      ErrorMessages.INCLUDE_NOT_FOUND(directive.path),
      directive.loc,
    );
    return;
  }

  const { source, key } =
    typeof loaded === "string"
      ? { source: loaded, key: directive.path }
      : loaded;
  if (context.included.has(key)) {
    return;
  }
  context.included.add(key);

  const result = parse(source, directive.path);
  if (!result.success) {
    const reason = Result.firstError(result)?.message ?? "unknown error";
    context.error(
      ErrorCode.INCLUDE_PARSE_ERROR,
      ErrorMessages.INCLUDE_PARSE_ERROR(directive.path, reason),
      directive.loc,
    );
    return;
  }

  const includingSource = context.sourceName;
  context.sourceName = directive.path;
  try {
    checkUnit(result.value, context);
  } finally {
    context.sourceName = includingSource;
  }
}

const NO_VALUE = Type.Basic.void_;

/**
 * Visitor entries for nodes that are handled structurally by `checkUnit`
 */
export const unitChecker: Pick<
  Visitor<Type, Context>,
  "translationUnit" | "includeDirective" | "typeSpecifier" | "declaration"
> = {
  translationUnit(node: Ast.TranslationUnit, context: Context): Type {
    checkUnit(node, context);
    return NO_VALUE;
  },

  includeDirective(node: Ast.IncludeDirective, context: Context): Type {
    processInclude(node, context);
    return NO_VALUE;
  },

  typeSpecifier(node: Ast.TypeSpecifier, context: Context): Type {
    return resolveType(node, context);
  },

  declaration(node: Ast.Declaration, context: Context): Type {
    switch (node.kind) {
      case "variable":
        return declareVariable(node, context);
      case "function":
        declareFunction(node, context);
        checkFunctionBody(node, context);
        return NO_VALUE;
      case "struct":
      case "typedef":
        declareTypeName(node, context);
        completeTypeDeclaration(node, context);
        return NO_VALUE;
      case "parameter":
      case "member":
        return resolveType(node.declaredType, context);
    }
  },
};
