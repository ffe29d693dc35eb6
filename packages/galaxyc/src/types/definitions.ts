/**
 * Type definitions for Galaxy script
 *
 * `equals` on each class is strict identity of the type's shape. The
 * absorbing behavior of `Failure` belongs to the type relations in
 * `relations.ts`, so these classes stay safe to use as map keys.
 */

export interface Type {
  kind: Type.Kind;
  toString(): string;
  equals(other: Type): boolean;
}

export namespace Type {
  export type Kind =
    | Type.Basic.Kind
    | Type.Handle.Kind
    | Type.Array.Kind
    | Type.Function.Kind
    | Type.Struct.Kind
    | Type.Typedef.Kind
    | Type.Null.Kind
    | Type.Failure.Kind;

  export class Basic implements Type {
    kind = "basic" as const;

    constructor(public name: Type.Basic.Name) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Basic && other.name === this.name;
    }
  }

  export const isBasic = (type: Type): type is Type.Basic =>
    type instanceof Type.Basic;

  export namespace Basic {
    export type Kind = "basic";
    export type Name = "void" | "int" | "fixed" | "bool" | "string" | "text";

    // Singleton instances
    export const void_ = new Type.Basic("void");
    export const int = new Type.Basic("int");
    export const fixed = new Type.Basic("fixed");
    export const bool = new Type.Basic("bool");
    export const string = new Type.Basic("string");
    export const text = new Type.Basic("text");
  }

  /**
   * Opaque engine reference (unit, trigger, timer, ...)
   */
  export class Handle implements Type {
    kind = "handle" as const;

    constructor(public name: string) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Handle && other.name === this.name;
    }
  }

  export const isHandle = (type: Type): type is Type.Handle =>
    type instanceof Type.Handle;

  export namespace Handle {
    export type Kind = "handle";
  }

  export class Array implements Type {
    kind = "array" as const;

    constructor(
      public elementType: Type,
      public size?: number, // undefined until folded, or when omitted
    ) {}

    toString(): string {
      const sizes: (number | undefined)[] = [];
      let element: Type = this;
      while (element instanceof Type.Array) {
        sizes.push(element.size);
        element = element.elementType;
      }
      return `${element.toString()}${sizes
        .map((size) => `[${size ?? ""}]`)
        .join("")}`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Array && this.elementType.equals(other.elementType)
      );
    }
  }

  export const isArray = (type: Type): type is Type.Array =>
    type instanceof Type.Array;

  export namespace Array {
    export type Kind = "array";
  }

  export class Function implements Type {
    kind = "function" as const;

    constructor(
      public returnType: Type,
      public parameterTypes: Type[],
    ) {}

    toString(): string {
      const params = this.parameterTypes.map((t) => t.toString()).join(", ");
      return `${this.returnType.toString()}(${params})`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Function &&
        this.returnType.equals(other.returnType) &&
        this.parameterTypes.length === other.parameterTypes.length &&
        this.parameterTypes.every((type, index) =>
          type.equals(other.parameterTypes[index]),
        )
      );
    }
  }

  export const isFunction = (type: Type): type is Type.Function =>
    type instanceof Type.Function;

  export namespace Function {
    export type Kind = "function";
  }

  /**
   * Nominal struct type. `members` stays undefined while only the name is
   * known and is filled in place once the body has been resolved.
   */
  export class Struct implements Type {
    kind = "struct" as const;

    constructor(
      public name: string,
      public members?: Map<string, Type>,
    ) {}

    toString(): string {
      return `struct ${this.name}`;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Struct && other.name === this.name;
    }

    isComplete(): this is Type.Struct & { members: Map<string, Type> } {
      return this.members !== undefined;
    }

    getMemberType(name: string): Type | undefined {
      return this.members?.get(name);
    }
  }

  export const isStruct = (type: Type): type is Type.Struct =>
    type instanceof Type.Struct;

  export namespace Struct {
    export type Kind = "struct";
  }

  export class Typedef implements Type {
    kind = "typedef" as const;

    constructor(
      public name: string,
      public underlying?: Type,
    ) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Typedef && other.name === this.name;
    }

    /**
     * Follow the alias chain to a non-alias type. An alias whose target is
     * still unknown, or that leads back to itself, resolves to a failure.
     */
    resolve(): Type {
      const seen = new Set<Type.Typedef>();
      let current: Type | undefined = this;
      while (current instanceof Type.Typedef) {
        if (seen.has(current)) {
          return new Type.Failure(`cyclic typedef ${this.name}`);
        }
        seen.add(current);
        current = current.underlying;
      }
      return current ?? new Type.Failure(`incomplete typedef ${this.name}`);
    }
  }

  export const isTypedef = (type: Type): type is Type.Typedef =>
    type instanceof Type.Typedef;

  export namespace Typedef {
    export type Kind = "typedef";
  }

  /**
   * Type of the `null` literal
   */
  export class Null implements Type {
    kind = "null" as const;

    toString(): string {
      return "null";
    }

    equals(other: Type): boolean {
      return other instanceof Type.Null;
    }
  }

  export const isNull = (type: Type): type is Type.Null =>
    type instanceof Type.Null;

  export namespace Null {
    export type Kind = "null";

    export const instance = new Type.Null();
  }

  /**
   * Poison type substituted wherever a fault was already reported
   */
  export class Failure implements Type {
    kind = "failure" as const;

    constructor(public reason?: string) {}

    toString(): string {
      return "<error>";
    }

    equals(other: Type): boolean {
      return other instanceof Type.Failure;
    }
  }

  export const isFailure = (type: Type): type is Type.Failure =>
    type instanceof Type.Failure;

  export namespace Failure {
    export type Kind = "failure";
  }
}
