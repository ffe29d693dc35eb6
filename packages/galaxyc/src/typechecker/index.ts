/**
 * Semantic analysis
 */

export { TypeChecker, analyze, type Analysis } from "./checker.js";
export {
  Context,
  DEFAULT_MAX_DEPTH,
  type CheckOptions,
  type LoadedSource,
  type SourceLoader,
  type UnitParser,
} from "./context.js";
export { evalConstInt, parseIntLiteral } from "./constants.js";
export { pass } from "./pass.js";
