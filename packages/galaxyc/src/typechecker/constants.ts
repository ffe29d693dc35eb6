/**
 * Compile-time integer folding, used to size arrays
 */

import * as Ast from "#ast";
import { isInt, type SymbolTable } from "#types";

const DECIMAL = /^[0-9]+$/;
const HEXADECIMAL = /^0[xX][0-9a-fA-F]+$/;

/**
 * Value of an integer literal's spelling (decimal or 0x-prefixed hex)
 */
export function parseIntLiteral(text: string): number | undefined {
  if (HEXADECIMAL.test(text)) {
    return Number.parseInt(text.slice(2), 16);
  }
  if (DECIMAL.test(text)) {
    return Number.parseInt(text, 10);
  }
  return undefined;
}

/**
 * Fold `expr` to an integer, or undefined when it is not a constant
 * expression.
 *
 * Identifiers only fold through the value already cached on a `const`
 * symbol, so a constant must be registered before anything that uses it.
 */
export function evalConstInt(
  expr: Ast.Expression,
  symbols: SymbolTable,
): number | undefined {
  switch (expr.type) {
    case "LiteralExpression":
      return expr.kind === "int" ? parseIntLiteral(expr.value) : undefined;

    case "IdentifierExpression": {
      const symbol = symbols.lookup(expr.name);
      if (
        symbol?.isConst &&
        isInt(symbol.type) &&
        typeof symbol.constValue === "number"
      ) {
        return symbol.constValue;
      }
      return undefined;
    }

    case "OperatorExpression": {
      if (Ast.Expression.Operator.isUnary(expr)) {
        if (expr.operator !== "-") {
          return undefined;
        }
        const value = evalConstInt(expr.operands[0], symbols);
        return value === undefined ? undefined : -value;
      }

      const [left, right] = expr.operands;
      const l = evalConstInt(left, symbols);
      const r = evalConstInt(right, symbols);
      if (l === undefined || r === undefined) {
        return undefined;
      }

      switch (expr.operator) {
        case "+":
          return l + r;
        case "-":
          return l - r;
        case "*":
          return l * r;
        // floor semantics: the remainder takes the sign of the divisor
        case "/":
          return r === 0 ? undefined : Math.floor(l / r);
        case "%":
          return r === 0 ? undefined : l - r * Math.floor(l / r);
        default:
          return undefined;
      }
    }

    default:
      return undefined;
  }
}
