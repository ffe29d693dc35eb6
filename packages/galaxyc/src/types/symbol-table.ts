/**
 * Symbol table for tracking declarations across nested scopes
 */

import type { Declaration } from "#ast";
import type { Type } from "./definitions.js";

export type SymbolKind = "variable" | "function" | "type" | "parameter";

/**
 * Folded value of a `const` binding
 */
export type ConstValue = number | string | boolean;

// Symbol table entry
export interface GalaxySymbol {
  name: string;
  type: Type;
  kind: SymbolKind;
  isStatic: boolean;
  isConst: boolean;
  isNative: boolean;
  constValue?: ConstValue;
  defined: boolean; // false for a function known only by its prototype
  declaration?: Declaration;
}

export function createSymbol(
  name: string,
  type: Type,
  kind: SymbolKind,
  options: Partial<Omit<GalaxySymbol, "name" | "type" | "kind">> = {},
): GalaxySymbol {
  return {
    name,
    type,
    kind,
    isStatic: options.isStatic ?? false,
    isConst: options.isConst ?? false,
    isNative: options.isNative ?? false,
    constValue: options.constValue,
    defined: options.defined ?? true,
    declaration: options.declaration,
  };
}

export type ScopeKind = "global" | "function" | "block";

export class Scope {
  private symbols = new Map<string, GalaxySymbol>();

  constructor(
    public readonly kind: ScopeKind,
    public readonly name?: string,
  ) {}

  /**
   * Insert a symbol; returns false, leaving the existing entry in place,
   * when the name is already taken in this scope
   */
  define(symbol: GalaxySymbol): boolean {
    if (this.symbols.has(symbol.name)) {
      return false;
    }
    this.symbols.set(symbol.name, symbol);
    return true;
  }

  get(name: string): GalaxySymbol | undefined {
    return this.symbols.get(name);
  }

  has(name: string): boolean {
    return this.symbols.has(name);
  }

  get size(): number {
    return this.symbols.size;
  }

  [Symbol.iterator](): IterableIterator<GalaxySymbol> {
    return this.symbols.values();
  }
}

// Symbol table with scoping
export class SymbolTable {
  private scopes: Scope[] = [new Scope("global")];

  get global(): Scope {
    return this.scopes[0];
  }

  get current(): Scope {
    return this.scopes[this.scopes.length - 1];
  }

  /**
   * Number of scopes above the global one
   */
  get depth(): number {
    return this.scopes.length - 1;
  }

  enterFunction(name: string): void {
    this.scopes.push(new Scope("function", name));
  }

  enterBlock(): void {
    this.scopes.push(new Scope("block"));
  }

  leaveScope(): void {
    if (this.scopes.length > 1) {
      this.scopes.pop();
    }
  }

  define(symbol: GalaxySymbol): boolean {
    return this.current.define(symbol);
  }

  lookup(name: string): GalaxySymbol | undefined {
    // Search from innermost to outermost scope
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const symbol = this.scopes[i].get(name);
      if (symbol) {
        return symbol;
      }
    }
    return undefined;
  }

  lookupLocal(name: string): GalaxySymbol | undefined {
    return this.current.get(name);
  }

  lookupGlobal(name: string): GalaxySymbol | undefined {
    return this.global.get(name);
  }
}
