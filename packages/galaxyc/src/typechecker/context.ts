import * as Ast from "#ast";
import {
  Type,
  SymbolTable,
  type BindingMap,
  type TypeMap,
} from "#types";
import { DiagnosticBag, ErrorCode, ErrorMessages } from "#diagnostics";
import type { GalaxyError } from "#errors";
import type { Result } from "#result";

/**
 * An included file's text, with a key naming the file it came from.
 * Includes that resolve to the same key are analyzed once.
 */
export interface LoadedSource {
  source: string;
  key: string;
}

/**
 * Reads an included file; undefined means "not found". Plain text is keyed
 * by the include path as written.
 */
export type SourceLoader = (
  path: string,
) => LoadedSource | string | undefined;

/**
 * Turns source text into a translation unit
 */
export type UnitParser = (
  source: string,
  sourceName: string,
) => Result<Ast.TranslationUnit, GalaxyError>;

export interface CheckOptions {
  /** Host-provided native functions, registered before user code */
  natives?: ReadonlyMap<string, Type.Function>;
  /** Include resolution; both are needed for includes to be followed */
  loadSource?: SourceLoader;
  parse?: UnitParser;
  /** Maximum syntactic nesting before analysis gives up on a subtree */
  maxDepth?: number;
  /** Name of the unit being checked, recorded on its diagnostics */
  sourceName?: string;
}

export const DEFAULT_MAX_DEPTH = 256;

export interface FunctionFrame {
  name: string;
  type: Type.Function;
}

/**
 * State for a single analysis run.
 * Created fresh for every run and threaded through every visitor call.
 */
export class Context {
  readonly symbols = new SymbolTable();
  readonly diagnostics = new DiagnosticBag();
  readonly types: TypeMap = new Map();
  readonly bindings: BindingMap = new Map();

  /** Signature declared by each function declaration */
  readonly signatures = new Map<Ast.Declaration.Function, Type.Function>();

  /** Struct/typedef declarations rejected as duplicates */
  readonly rejectedTypes = new Set<Ast.Declaration>();

  /** Include paths already processed */
  readonly included = new Set<string>();

  currentFunction?: FunctionFrame;
  loopDepth = 0;
  sourceName: string;

  private depth = 0;
  private reportedDepth = false;

  readonly loadSource?: SourceLoader;
  readonly parse?: UnitParser;
  readonly maxDepth: number;

  constructor(
    readonly visitor: Ast.Visitor<Type, Context>,
    options: CheckOptions = {},
  ) {
    this.loadSource = options.loadSource;
    this.parse = options.parse;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.sourceName = options.sourceName ?? "<input>";
  }

  /**
   * Visit a child node, enforcing the nesting limit
   */
  check(node: Ast.Node): Type {
    if (this.depth >= this.maxDepth) {
      if (!this.reportedDepth) {
        this.reportedDepth = true;
        this.error(
          ErrorCode.NESTING_TOO_DEEP,
          ErrorMessages.NESTING_TOO_DEEP(this.maxDepth),
          node.loc,
        );
      }
      return this.record(node, new Type.Failure("nesting too deep"));
    }

    this.depth++;
    try {
      return Ast.visit(this.visitor, node, this);
    } finally {
      this.depth--;
    }
  }

  record<T extends Type>(node: Ast.Node, type: T): T {
    this.types.set(node, type);
    return type;
  }

  error(
    code: ErrorCode,
    message: string,
    location: Ast.SourceLocation | null,
    hint?: string,
  ): void {
    this.diagnostics.error(message, code, location, {
      hint,
      source: this.sourceName,
    });
  }

  warning(
    code: ErrorCode,
    message: string,
    location: Ast.SourceLocation | null,
    hint?: string,
  ): void {
    this.diagnostics.warning(message, code, location, {
      hint,
      source: this.sourceName,
    });
  }
}
