import type { TranslationUnit } from "#ast";
import type { Pass } from "#compiler";
import { Result } from "#result";

import type { ParseError } from "./errors.js";
import { parse } from "./parser.js";

/**
 * Parsing pass - converts source code to AST
 */
export const pass: Pass<{
  needs: {
    source: string;
  };
  adds: {
    ast: TranslationUnit;
  };
  error: ParseError;
}> = {
  run({ source }) {
    return Result.map(parse(source), (ast) => ({ ast }));
  },
};
