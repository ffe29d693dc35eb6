/**
 * Type system for Galaxy script
 *
 * Type definitions, the conversion rules between them and the symbol
 * table. Kept apart from the checker so that other modules can use types
 * without depending on the checking logic.
 */

export { Type } from "./definitions.js";
export * from "./builtins.js";
export * from "./relations.js";
export * from "./symbol-table.js";
export {
  Formatter,
  formatSymbolTable,
  type FormatOptions,
} from "./analysis/formatter.js";

import type * as Ast from "#ast";
import type { Type } from "./definitions.js";
import type { GalaxySymbol } from "./symbol-table.js";

// Side tables written by the checker
export type TypeMap = Map<Ast.Node, Type>;
export type BindingMap = Map<Ast.Expression.Identifier, GalaxySymbol>;
