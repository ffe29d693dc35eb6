/**
 * Semantic analyzer for Galaxy script
 *
 * Resolves every name, checks every expression and statement against the
 * type rules, and collects diagnostics instead of stopping at the first
 * fault.
 */

import type * as Ast from "#ast";
import {
  BUILTIN_TYPES,
  Type,
  createSymbol,
  type BindingMap,
  type SymbolTable,
  type TypeMap,
} from "#types";
import {
  type DiagnosticBag,
  ErrorCode,
  ErrorMessages,
} from "#diagnostics";

import { Context, type CheckOptions } from "./context.js";
import { unitChecker } from "./units.js";
import { statementChecker } from "./statements.js";
import { expressionChecker } from "./expressions.js";

/**
 * Everything one analysis run produces. `symbolTable` is null when the
 * run stopped on an internal fault.
 */
export interface Analysis {
  symbolTable: SymbolTable | null;
  diagnostics: DiagnosticBag;
  types: TypeMap;
  bindings: BindingMap;
}

const visitor = {
  ...unitChecker,
  ...statementChecker,
  ...expressionChecker,
} satisfies Ast.Visitor<Type, Context>;

export class TypeChecker {
  constructor(private readonly options: CheckOptions = {}) {}

  /**
   * Analyze a translation unit. Each call starts from a fresh symbol
   * table and diagnostic bag.
   */
  check(unit: Ast.TranslationUnit): Analysis {
    const context = new Context(visitor, this.options);
    this.registerBuiltins(context);

    try {
      context.check(unit);
    } catch (error) {
      context.diagnostics.error(
        ErrorMessages.INTERNAL_ERROR(describe(error)),
        ErrorCode.INTERNAL_ERROR,
      );
      return {
        symbolTable: null,
        diagnostics: context.diagnostics,
        types: context.types,
        bindings: context.bindings,
      };
    }

    return {
      symbolTable: context.symbols,
      diagnostics: context.diagnostics,
      types: context.types,
      bindings: context.bindings,
    };
  }

  private registerBuiltins(context: Context): void {
    for (const [name, type] of BUILTIN_TYPES) {
      context.symbols.define(createSymbol(name, type, "type"));
    }

    for (const [name, type] of this.options.natives ?? []) {
      context.symbols.define(
        createSymbol(name, type, "function", { isNative: true }),
      );
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export function analyze(
  unit: Ast.TranslationUnit,
  options: CheckOptions = {},
): Analysis {
  return new TypeChecker(options).check(unit);
}
