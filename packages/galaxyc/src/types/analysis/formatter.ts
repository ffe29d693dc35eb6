import { Type } from "../definitions.js";
import type {
  GalaxySymbol,
  SymbolKind,
  SymbolTable,
} from "../symbol-table.js";

export interface FormatOptions {
  /**
   * Also list symbols that were not declared in source (built-in types
   * and host-provided natives)
   */
  includeBuiltins?: boolean;
}

const GROUPS: [string, SymbolKind][] = [
  ["Types", "type"],
  ["Functions", "function"],
  ["Variables", "variable"],
];

export class Formatter {
  private output: string[] = [];

  format(table: SymbolTable, options: FormatOptions = {}): string {
    this.output = [];

    this.line("=== Symbol Table ===");

    const symbols = [...table.global].filter(
      (symbol) => options.includeBuiltins || symbol.declaration !== undefined,
    );

    for (const [title, kind] of GROUPS) {
      const entries = symbols.filter((symbol) => symbol.kind === kind);
      if (entries.length === 0) {
        continue;
      }

      this.line("");
      this.line(`${title}:`);
      for (const symbol of entries) {
        this.line(`  ${this.describe(symbol)}`);
      }
    }

    return this.output.join("\n");
  }

  private describe(symbol: GalaxySymbol): string {
    switch (symbol.kind) {
      case "type":
        return `${symbol.name} = ${this.describeType(symbol.type)}`;
      case "function": {
        const flags = [
          symbol.isNative ? "native" : undefined,
          symbol.isStatic ? "static" : undefined,
          symbol.defined ? undefined : "prototype",
        ].filter((flag) => flag !== undefined);
        const suffix = flags.length > 0 ? ` [${flags.join(", ")}]` : "";
        return `${symbol.name}: ${symbol.type.toString()}${suffix}`;
      }
      case "variable":
      case "parameter": {
        const modifiers =
          (symbol.isStatic ? "static " : "") + (symbol.isConst ? "const " : "");
        const value =
          symbol.constValue === undefined
            ? ""
            : ` = ${formatValue(symbol.constValue)}`;
        return `${modifiers}${symbol.name}: ${symbol.type.toString()}${value}`;
      }
    }
  }

  private describeType(type: Type): string {
    if (Type.isStruct(type)) {
      if (!type.members) {
        return "struct (incomplete)";
      }
      const members = [...type.members]
        .map(([name, member]) => `${name}: ${member.toString()}`)
        .join("; ");
      return `struct { ${members} }`;
    }

    if (Type.isTypedef(type)) {
      return type.underlying?.toString() ?? "<unresolved>";
    }

    return type.toString();
  }

  private line(text: string): void {
    this.output.push(text);
  }
}

function formatValue(value: GalaxySymbol["constValue"]): string {
  return typeof value === "string" ? `"${value}"` : String(value);
}

export function formatSymbolTable(
  table: SymbolTable,
  options: FormatOptions = {},
): string {
  return new Formatter().format(table, options);
}
