import type { TranslationUnit } from "#ast";
import type { Diagnostic } from "#diagnostics";
import type { Pass } from "#compiler";
import { Result } from "#result";

import { analyze, type Analysis } from "./checker.js";
import type { CheckOptions } from "./context.js";

/**
 * Semantic analysis pass - resolves names and checks types.
 *
 * Analysis always runs to completion, so the pass succeeds even when the
 * program does not; its findings travel as messages.
 */
export const pass: Pass<{
  needs: CheckOptions & {
    ast: TranslationUnit;
  };
  adds: {
    analysis: Analysis;
  };
  error: Diagnostic;
}> = {
  run({ ast, ...options }) {
    const analysis = analyze(ast, options);
    return Result.okWith({ analysis }, [...analysis.diagnostics]);
  },
};
