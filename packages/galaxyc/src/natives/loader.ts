/**
 * Host function signatures
 *
 * The engine exposes thousands of native functions. Their signatures are
 * read from `native` declaration files, or from a definition table such as
 * the bundled `common.json`.
 */

import { existsSync, readFileSync } from "node:fs";

import { BUILTIN_TYPES, Type } from "#types";

import common from "./common.json";

/**
 * A native signature spelled with type names
 */
export interface NativeDefinition {
  returns: string;
  parameters: readonly string[];
}

export type NativeDefinitions = Readonly<Record<string, NativeDefinition>>;

// native void TriggerExecute(trigger t, bool checkConds, bool wait);
const NATIVE_DECLARATION =
  /^native\s+(\w+)(\[[\d\s]*\])?\s+([A-Za-z_]\w*)\s*\(([^)]*)\)\s*;/;
const PARAMETER = /(?:const\s+)?(\w+)(\[[\d\s]*\])?\s+([A-Za-z_]\w*)/;

/**
 * Type for a name as written in a declaration. Arrays are one level deep;
 * sizes are not recorded.
 */
export function nativeType(name: string, isArray = false): Type {
  const base =
    BUILTIN_TYPES.get(name.trim()) ?? new Type.Failure(`unknown type ${name}`);
  return isArray ? new Type.Array(base) : base;
}

export class NativeLoader {
  private readonly functions = new Map<string, Type.Function>();
  private readonly errors: string[] = [];

  /**
   * Read every `native` declaration line of a file
   *
   * @returns the number of signatures loaded
   */
  loadFromFile(path: string): number {
    if (!existsSync(path)) {
      this.errors.push(`File not found: ${path}`);
      return 0;
    }
    return this.loadFromText(readFileSync(path, "utf-8"));
  }

  /**
   * @returns the number of signatures loaded
   */
  loadFromText(text: string): number {
    let count = 0;
    for (const line of text.split(/\r?\n/)) {
      const match = NATIVE_DECLARATION.exec(line.trim());
      if (!match) {
        continue;
      }

      const [, returns, returnsArray, name, parameters] = match;
      this.functions.set(
        name,
        new Type.Function(
          nativeType(returns, returnsArray !== undefined),
          parseParameters(parameters),
        ),
      );
      count++;
    }
    return count;
  }

  loadFromDefinitions(definitions: NativeDefinitions): void {
    for (const [name, { returns, parameters }] of Object.entries(
      definitions,
    )) {
      this.functions.set(
        name,
        new Type.Function(
          nativeType(returns),
          parameters.map((parameter) => nativeType(parameter)),
        ),
      );
    }
  }

  /**
   * Load the bundled table of frequently used natives
   */
  loadCommon(): void {
    this.loadFromDefinitions(common);
  }

  builtins(): Map<string, Type.Function> {
    return new Map(this.functions);
  }

  get loadErrors(): string[] {
    return [...this.errors];
  }
}

function parseParameters(text: string): Type[] {
  const trimmed = text.trim();
  if (trimmed === "" || trimmed.toLowerCase() === "void") {
    return [];
  }

  const types: Type[] = [];
  for (const part of trimmed.split(",")) {
    const parameter = part.trim();
    if (!parameter) {
      continue;
    }

    const match = PARAMETER.exec(parameter);
    if (match) {
      types.push(nativeType(match[1], match[2] !== undefined));
      continue;
    }

    // unnamed parameter: the first word is the type
    const [first] = parameter.split(/\s+/);
    types.push(nativeType(first));
  }
  return types;
}
