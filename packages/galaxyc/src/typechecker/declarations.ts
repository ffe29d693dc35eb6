/**
 * Declaration handling: type resolution and symbol registration
 */

import type * as Ast from "#ast";
import {
  Type,
  canAssign,
  createSymbol,
  isVoid,
  sameType,
  unwrap,
  type ConstValue,
} from "#types";
import { ErrorCode, ErrorMessages } from "#diagnostics";

import type { Context } from "./context.js";
import { evalConstInt } from "./constants.js";

/**
 * Resolve a type specifier to a type, folding array dimensions
 */
export function resolveType(spec: Ast.TypeSpecifier, context: Context): Type {
  const symbol = context.symbols.lookup(spec.name);
  if (!symbol) {
    context.error(
      ErrorCode.UNDEFINED_TYPE,
      ErrorMessages.UNDEFINED_TYPE(spec.name),
      spec.loc,
    );
    return context.record(spec, new Type.Failure(`unknown type ${spec.name}`));
  }
  if (symbol.kind !== "type") {
    context.error(
      ErrorCode.UNDEFINED_TYPE,
      ErrorMessages.NOT_A_TYPE(spec.name),
      spec.loc,
    );
    return context.record(spec, new Type.Failure(`${spec.name} is not a type`));
  }

  // Innermost dimension is last; build arrays from the inside out
  let type = symbol.type;
  for (let i = spec.dimensions.length - 1; i >= 0; i--) {
    const dimension = spec.dimensions[i];
    let size: number | undefined;
    if (dimension) {
      size = evalConstInt(dimension, context.symbols);
      if (size === undefined) {
        context.error(
          ErrorCode.NON_CONSTANT_ARRAY_SIZE,
          ErrorMessages.NON_CONSTANT_ARRAY_SIZE,
          dimension.loc,
        );
      } else if (size <= 0) {
        context.error(
          ErrorCode.INVALID_ARRAY_SIZE,
          ErrorMessages.INVALID_ARRAY_SIZE(size),
          dimension.loc,
        );
        size = undefined;
      }
    }
    type = new Type.Array(type, size);
  }

  return context.record(spec, type);
}

/**
 * Whether `spec` would resolve without reporting anything at this point
 */
export function isResolvable(
  spec: Ast.TypeSpecifier,
  context: Context,
): boolean {
  const symbol = context.symbols.lookup(spec.name);
  return (
    symbol?.kind === "type" &&
    spec.dimensions.every(
      (dimension) =>
        dimension === null ||
        (evalConstInt(dimension, context.symbols) ?? 0) > 0,
    )
  );
}

function constValueOf(
  initializer: Ast.Expression,
  type: Type,
  context: Context,
): ConstValue | undefined {
  const resolved = unwrap(type);
  if (!Type.isBasic(resolved)) {
    return undefined;
  }

  switch (resolved.name) {
    case "int":
      return evalConstInt(initializer, context.symbols);
    case "string":
      return initializer.type === "LiteralExpression" &&
        initializer.kind === "string"
        ? initializer.value
        : undefined;
    case "bool":
      return initializer.type === "LiteralExpression" &&
        initializer.kind === "bool"
        ? initializer.value === "true"
        : undefined;
    case "fixed":
      return initializer.type === "LiteralExpression" &&
        initializer.kind === "fixed"
        ? Number.parseFloat(initializer.value)
        : undefined;
    default:
      return undefined;
  }
}

/**
 * Declare a variable in the current scope and check its initializer
 */
export function declareVariable(
  declaration: Ast.Declaration.Variable,
  context: Context,
): Type {
  let type = resolveType(declaration.declaredType, context);
  if (isVoid(type)) {
    context.error(
      ErrorCode.VOID_VARIABLE,
      ErrorMessages.VOID_VARIABLE(declaration.name),
      declaration.loc,
    );
    type = new Type.Failure("void variable");
  }

  const symbol = createSymbol(declaration.name, type, "variable", {
    isStatic: declaration.isStatic,
    isConst: declaration.isConst,
    declaration,
  });
  if (declaration.isConst && declaration.initializer) {
    symbol.constValue = constValueOf(declaration.initializer, type, context);
  }

  if (!context.symbols.define(symbol)) {
    context.error(
      ErrorCode.REDECLARATION,
      ErrorMessages.VARIABLE_REDECLARED(declaration.name),
      declaration.loc,
    );
  }

  if (declaration.initializer) {
    const initializerType = context.check(declaration.initializer);
    if (!canAssign(type, initializerType)) {
      context.error(
        ErrorCode.TYPE_MISMATCH,
        ErrorMessages.INITIALIZER_MISMATCH(
          declaration.name,
          initializerType.toString(),
          type.toString(),
        ),
        declaration.initializer.loc,
      );
    }
  }

  return context.record(declaration, type);
}

/**
 * Register a struct or typedef by name only, so that later declarations
 * can refer to it before its body is resolved
 */
export function declareTypeName(
  declaration: Ast.Declaration.Struct | Ast.Declaration.Typedef,
  context: Context,
): void {
  const type =
    declaration.kind === "struct"
      ? new Type.Struct(declaration.name)
      : new Type.Typedef(declaration.name);

  const symbol = createSymbol(declaration.name, type, "type", { declaration });
  if (!context.symbols.define(symbol)) {
    context.error(
      ErrorCode.REDECLARATION,
      ErrorMessages.TYPE_REDECLARED(declaration.name),
      declaration.loc,
    );
    context.rejectedTypes.add(declaration);
  }
}

/**
 * Fill in struct members or the typedef target of a name registered by
 * `declareTypeName`
 */
export function completeTypeDeclaration(
  declaration: Ast.Declaration.Struct | Ast.Declaration.Typedef,
  context: Context,
): void {
  if (context.rejectedTypes.has(declaration)) {
    return;
  }

  const type = context.symbols.lookupGlobal(declaration.name)?.type;

  if (declaration.kind === "struct") {
    if (!type || !Type.isStruct(type)) {
      return;
    }
    const members = new Map<string, Type>();
    for (const member of declaration.members) {
      const memberType = resolveType(member.declaredType, context);
      context.record(member, memberType);
      if (members.has(member.name)) {
        context.error(
          ErrorCode.DUPLICATE_MEMBER,
          ErrorMessages.DUPLICATE_MEMBER(declaration.name, member.name),
          member.loc,
        );
        continue;
      }
      members.set(member.name, memberType);
    }
    type.members = members;
    context.record(declaration, type);
    return;
  }

  if (!type || !Type.isTypedef(type)) {
    return;
  }
  type.underlying = resolveType(declaration.declaredType, context);
  if (refersToItself(type)) {
    context.error(
      ErrorCode.CYCLIC_TYPEDEF,
      ErrorMessages.CYCLIC_TYPEDEF(declaration.name),
      declaration.loc,
    );
    type.underlying = new Type.Failure(`cyclic typedef ${declaration.name}`);
  }
  context.record(declaration, type);
}

function refersToItself(typedef: Type.Typedef): boolean {
  const seen = new Set<Type.Typedef>();
  let current = typedef.underlying;
  while (current && Type.isTypedef(current) && !seen.has(current)) {
    if (current === typedef) {
      return true;
    }
    seen.add(current);
    current = current.underlying;
  }
  return false;
}

/**
 * Register a function signature, or reconcile it with an earlier
 * declaration of the same name
 */
export function declareFunction(
  declaration: Ast.Declaration.Function,
  context: Context,
): Type.Function {
  const returnType = resolveType(declaration.returnType, context);
  const parameterTypes = declaration.parameters.map((parameter) =>
    context.record(parameter, resolveType(parameter.declaredType, context)),
  );
  const type = new Type.Function(returnType, parameterTypes);
  context.signatures.set(declaration, type);
  context.record(declaration, type);

  const existing = context.symbols.lookupGlobal(declaration.name);
  if (!existing) {
    context.symbols.define(
      createSymbol(declaration.name, type, "function", {
        isStatic: declaration.isStatic,
        isNative: declaration.isNative,
        defined: declaration.body !== undefined || declaration.isNative,
        declaration,
      }),
    );
    return type;
  }

  if (existing.kind !== "function") {
    context.error(
      ErrorCode.REDECLARATION,
      ErrorMessages.NOT_A_FUNCTION(declaration.name),
      declaration.loc,
    );
    return type;
  }

  if (!sameType(existing.type, type)) {
    context.error(
      ErrorCode.REDECLARATION,
      ErrorMessages.FUNCTION_SIGNATURE_MISMATCH(declaration.name),
      declaration.loc,
      `earlier: ${existing.type.toString()}, here: ${type.toString()}`,
    );
    return type;
  }

  if (declaration.body) {
    if (existing.defined) {
      context.error(
        ErrorCode.REDECLARATION,
        ErrorMessages.FUNCTION_REDEFINED(declaration.name),
        declaration.loc,
      );
      return type;
    }
    existing.defined = true;
    existing.declaration = declaration;
  }

  return type;
}

/**
 * Check a function body against its own declared signature
 */
export function checkFunctionBody(
  declaration: Ast.Declaration.Function,
  context: Context,
): void {
  const signature = context.signatures.get(declaration);
  if (!declaration.body || !signature) {
    return;
  }

  context.currentFunction = { name: declaration.name, type: signature };
  context.loopDepth = 0;
  context.symbols.enterFunction(declaration.name);

  declaration.parameters.forEach((parameter, index) => {
    const symbol = createSymbol(
      parameter.name,
      signature.parameterTypes[index],
      "parameter",
      { isConst: parameter.isConst, declaration: parameter },
    );
    if (!context.symbols.define(symbol)) {
      context.error(
        ErrorCode.DUPLICATE_PARAMETER,
        ErrorMessages.DUPLICATE_PARAMETER(parameter.name),
        parameter.loc,
      );
    }
  });

  context.check(declaration.body);

  context.symbols.leaveScope();
  context.currentFunction = undefined;
}
