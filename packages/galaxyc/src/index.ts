export const VERSION = "0.1.0";

export * as Ast from "#ast";

// Re-export parser functionality
export { parse, Parser, ParseError } from "#parser";

// Re-export semantic analysis
export {
  TypeChecker,
  analyze,
  evalConstInt,
  type Analysis,
  type CheckOptions,
  type LoadedSource,
  type SourceLoader,
} from "#typechecker";

// Re-export type system
export {
  Type,
  SymbolTable,
  Scope,
  formatSymbolTable,
  sameType,
  canAssign,
  type GalaxySymbol,
} from "#types";

// Re-export diagnostics
export { Diagnostic, DiagnosticBag, ErrorCode } from "#diagnostics";

// Re-export native signature loading
export { NativeLoader } from "#natives";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export front-end entry points
export {
  compile,
  compileFile,
  fileSourceLoader,
  type CompileOptions,
  type FrontendResult,
} from "#compiler";
