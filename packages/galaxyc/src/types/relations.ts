/**
 * Conversion and operator rules over Galaxy types
 *
 * Every relation checks `Failure` first so that a fault reported once does
 * not produce follow-on faults, and looks through typedef aliases before
 * classifying a type.
 */

import type { Expression } from "#ast";
import { Type } from "./definitions.js";

/**
 * Strip typedef aliases
 */
export function unwrap(type: Type): Type {
  return Type.isTypedef(type) ? type.resolve() : type;
}

/**
 * Type identity as used by the checker. Structs and typedefs compare by
 * name, arrays and functions by their components.
 */
export function sameType(a: Type, b: Type): boolean {
  if (Type.isFailure(a) || Type.isFailure(b)) {
    return true;
  }

  if (Type.isTypedef(a) && Type.isTypedef(b)) {
    return a.name === b.name;
  }
  if (Type.isTypedef(a) || Type.isTypedef(b)) {
    return sameType(unwrap(a), unwrap(b));
  }

  if (Type.isArray(a)) {
    return Type.isArray(b) && sameType(a.elementType, b.elementType);
  }

  if (Type.isFunction(a)) {
    return (
      Type.isFunction(b) &&
      sameType(a.returnType, b.returnType) &&
      a.parameterTypes.length === b.parameterTypes.length &&
      a.parameterTypes.every((param, i) =>
        sameType(param, b.parameterTypes[i]),
      )
    );
  }

  return a.equals(b);
}

const isBasicNamed = (type: Type, ...names: Type.Basic.Name[]): boolean => {
  const resolved = unwrap(type);
  return Type.isBasic(resolved) && names.includes(resolved.name);
};

export const isVoid = (type: Type): boolean => isBasicNamed(type, "void");

export const isInt = (type: Type): boolean => isBasicNamed(type, "int");

export const isNumeric = (type: Type): boolean =>
  isBasicNamed(type, "int", "fixed");

/**
 * Types that take `+ - * /`; the same set as the numeric types
 */
export const isArithmetic = (type: Type): boolean => isNumeric(type);

/**
 * Types that take `==` and `!=`
 */
export function isComparable(type: Type): boolean {
  const resolved = unwrap(type);
  return (
    Type.isBasic(resolved) ||
    Type.isHandle(resolved) ||
    Type.isNull(resolved) ||
    Type.isFailure(resolved)
  );
}

/**
 * Types that take `< > <= >=`
 */
export const isOrderable = (type: Type): boolean =>
  isNumeric(type) || isBasicNamed(type, "string");

/**
 * Can a value of type `source` be stored into a location of type `target`?
 */
export function canAssign(target: Type, source: Type): boolean {
  if (Type.isFailure(target) || Type.isFailure(source)) {
    return true;
  }

  if (sameType(target, source)) {
    return true;
  }

  // int and fixed convert in both directions
  if (isNumeric(target) && isNumeric(source)) {
    return true;
  }

  if (isBasicNamed(target, "bool") && isNumeric(source)) {
    return true;
  }

  const dst = unwrap(target);
  const src = unwrap(source);

  if (
    Type.isNull(src) &&
    (Type.isHandle(dst) || isBasicNamed(dst, "string", "text"))
  ) {
    return true;
  }

  if (dst !== target || src !== source) {
    return canAssign(dst, src);
  }

  return false;
}

const ARITHMETIC_OPERATORS = new Set(["+", "-", "*", "/", "%"]);
const BITWISE_OPERATORS = new Set(["<<", ">>", "&", "|", "^"]);
const RELATIONAL_OPERATORS = new Set(["<", ">", "<=", ">="]);
const EQUALITY_OPERATORS = new Set(["==", "!="]);
const LOGICAL_OPERATORS = new Set(["&&", "||"]);

/**
 * Result type of `left op right`, or undefined when the operator does not
 * apply to these operands
 */
export function resolveBinaryOp(
  operator: Expression.BinaryOperator,
  left: Type,
  right: Type,
): Type | undefined {
  if (Type.isFailure(left) || Type.isFailure(right)) {
    return new Type.Failure();
  }

  if (ARITHMETIC_OPERATORS.has(operator)) {
    if (isArithmetic(left) && isArithmetic(right)) {
      return isBasicNamed(left, "fixed") || isBasicNamed(right, "fixed")
        ? Type.Basic.fixed
        : Type.Basic.int;
    }
    if (
      operator === "+" &&
      isBasicNamed(left, "string") &&
      isBasicNamed(right, "string")
    ) {
      return Type.Basic.string;
    }
    return undefined;
  }

  if (BITWISE_OPERATORS.has(operator)) {
    return isInt(left) && isInt(right) ? Type.Basic.int : undefined;
  }

  if (RELATIONAL_OPERATORS.has(operator)) {
    if (isOrderable(left) && sameType(left, right)) {
      return Type.Basic.bool;
    }
    if (isNumeric(left) && isNumeric(right)) {
      return Type.Basic.bool;
    }
    return undefined;
  }

  if (EQUALITY_OPERATORS.has(operator)) {
    if (Type.isNull(unwrap(left)) || Type.isNull(unwrap(right))) {
      return Type.Basic.bool;
    }
    if (
      isComparable(left) &&
      isComparable(right) &&
      (canAssign(left, right) || canAssign(right, left))
    ) {
      return Type.Basic.bool;
    }
    return undefined;
  }

  if (LOGICAL_OPERATORS.has(operator)) {
    return canAssign(Type.Basic.bool, left) &&
      canAssign(Type.Basic.bool, right)
      ? Type.Basic.bool
      : undefined;
  }

  return undefined;
}

/**
 * Result type of `cond ? a : b`, or undefined when the branches disagree
 */
export function commonType(a: Type, b: Type): Type | undefined {
  if (sameType(a, b) || canAssign(a, b)) {
    return a;
  }
  if (canAssign(b, a)) {
    return b;
  }
  return undefined;
}
