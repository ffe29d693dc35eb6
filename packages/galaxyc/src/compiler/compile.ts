/**
 * Front-end entry points: source text in, AST plus analysis out
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, extname, resolve } from "node:path";

import * as Ast from "#ast";
import { DiagnosticBag, ErrorCode, ErrorMessages } from "#diagnostics";
import { parse, pass as parsingPass, type ParseError } from "#parser";
import { Severity } from "#result";
import {
  pass as analysisPass,
  type SourceLoader,
} from "#typechecker";
import type { BindingMap, SymbolTable, Type, TypeMap } from "#types";

export interface CompileOptions {
  source: string;
  /** Recorded on diagnostics; defaults to `<input>` */
  sourceName?: string;
  natives?: ReadonlyMap<string, Type.Function>;
  /** Resolves `include` paths; includes are skipped without one */
  loadSource?: SourceLoader;
  maxDepth?: number;
}

export interface FrontendResult {
  ast: Ast.TranslationUnit | null;
  diagnostics: DiagnosticBag;
  symbolTable: SymbolTable | null;
  types: TypeMap;
  bindings: BindingMap;
  /** The AST was built and no error was reported */
  success: boolean;
}

const DEFAULT_SOURCE_NAME = "<input>";

// expectations such as `expression` name a category, not literal text
const WORD = /^\w+$/;

/**
 * Parse and analyze one translation unit
 */
export function compile(options: CompileOptions): FrontendResult {
  const sourceName = options.sourceName ?? DEFAULT_SOURCE_NAME;
  const diagnostics = new DiagnosticBag();

  let parsed: ReturnType<typeof parsingPass.run>;
  try {
    parsed = parsingPass.run({ source: options.source });
  } catch (error) {
    diagnostics.error(
      ErrorMessages.AST_CONSTRUCTION(describe(error)),
      ErrorCode.AST_CONSTRUCTION,
      undefined,
      { source: sourceName },
    );
    return failed(diagnostics);
  }

  if (!parsed.success) {
    for (const error of parsed.messages[Severity.Error] ?? []) {
      diagnostics.error(error.message, ErrorCode.SYNTAX_ERROR, error.location, {
        hint: expectedHint(error),
        source: sourceName,
      });
    }
    return failed(diagnostics);
  }

  const { ast } = parsed.value;
  if (!Ast.isTranslationUnit(ast)) {
    diagnostics.error(
      ErrorMessages.INVALID_ROOT(describeRoot(ast)),
      ErrorCode.INVALID_ROOT,
      undefined,
      { source: sourceName },
    );
    return failed(diagnostics);
  }

  const checked = analysisPass.run({
    ast,
    natives: options.natives,
    loadSource: options.loadSource,
    parse,
    maxDepth: options.maxDepth,
    sourceName,
  });
  if (!checked.success) {
    for (const error of checked.messages[Severity.Error] ?? []) {
      diagnostics.add(error);
    }
    return { ...failed(diagnostics), ast };
  }

  const { analysis } = checked.value;
  return {
    ast,
    diagnostics: analysis.diagnostics,
    symbolTable: analysis.symbolTable,
    types: analysis.types,
    bindings: analysis.bindings,
    success: !analysis.diagnostics.hasErrors,
  };
}

/**
 * Read `path` and compile it, resolving includes beside it unless a
 * loader is given
 */
export function compileFile(
  path: string,
  options: Omit<CompileOptions, "source"> = {},
): FrontendResult {
  const sourceName = options.sourceName ?? path;

  if (!existsSync(path)) {
    const diagnostics = new DiagnosticBag();
    diagnostics.error(
      ErrorMessages.FILE_NOT_FOUND(path),
      ErrorCode.FILE_NOT_FOUND,
      undefined,
      { source: sourceName },
    );
    return failed(diagnostics);
  }

  return compile({
    ...options,
    source: readFileSync(path, "utf-8"),
    sourceName,
    loadSource: options.loadSource ?? fileSourceLoader(dirname(path)),
  });
}

/**
 * Loader resolving include paths against `baseDir`; a path without an
 * extension also tries `.galaxy`. Files are keyed by their resolved path.
 */
export function fileSourceLoader(baseDir: string): SourceLoader {
  return (path) => {
    const candidates = [resolve(baseDir, path)];
    if (extname(path) === "") {
      candidates.push(resolve(baseDir, `${path}.galaxy`));
    }

    for (const candidate of candidates) {
      if (existsSync(candidate)) {
        return { source: readFileSync(candidate, "utf-8"), key: candidate };
      }
    }
    return undefined;
  };
}

function failed(diagnostics: DiagnosticBag): FrontendResult {
  return {
    ast: null,
    diagnostics,
    symbolTable: null,
    types: new Map(),
    bindings: new Map(),
    success: false,
  };
}

function expectedHint(error: ParseError): string | undefined {
  if (!error.expected?.length) {
    return undefined;
  }
  const quoted = error.expected.map((entry) =>
    WORD.test(entry) ? entry : `'${entry}'`,
  );
  return `expected ${quoted.join(" or ")}`;
}

function describeRoot(root: unknown): string {
  return Ast.Node.isBase(root) ? root.type : typeof root;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
