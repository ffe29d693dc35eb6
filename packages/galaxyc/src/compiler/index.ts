/**
 * Front-end pipeline
 */

export * from "./pass.js";
export {
  compile,
  compileFile,
  fileSourceLoader,
  type CompileOptions,
  type FrontendResult,
} from "./compile.js";
