/**
 * Diagnostic codes and message templates
 */

export enum ErrorCode {
  // Names and declarations
  UNDECLARED_IDENTIFIER = "GS001",
  UNDEFINED_TYPE = "GS002",
  REDECLARATION = "GS003",
  DUPLICATE_MEMBER = "GS004",
  DUPLICATE_PARAMETER = "GS005",
  CYCLIC_TYPEDEF = "GS006",
  VOID_VARIABLE = "GS007",
  NON_CONSTANT_ARRAY_SIZE = "GS008",
  INVALID_ARRAY_SIZE = "GS009",

  // Expressions
  TYPE_MISMATCH = "GS010",
  INVALID_OPERANDS = "GS011",
  INVALID_OPERAND = "GS012",
  INVALID_CONDITION = "GS013",
  INCOMPATIBLE_BRANCHES = "GS014",
  INVALID_ASSIGNMENT_TARGET = "GS015",
  ASSIGNMENT_TO_CONST = "GS016",
  UNSAFE_CAST = "GS017",
  NOT_CALLABLE = "GS018",
  ARGUMENT_COUNT = "GS019",
  ARGUMENT_TYPE = "GS020",
  INVALID_INDEX = "GS021",
  NOT_INDEXABLE = "GS022",
  NOT_A_STRUCT = "GS023",
  INCOMPLETE_STRUCT = "GS024",
  NO_SUCH_MEMBER = "GS025",

  // Control flow
  RETURN_OUTSIDE_FUNCTION = "GS030",
  RETURN_VALUE_IN_VOID = "GS031",
  MISSING_RETURN_VALUE = "GS032",
  RETURN_TYPE = "GS033",
  BREAK_OUTSIDE_LOOP = "GS034",
  CONTINUE_OUTSIDE_LOOP = "GS035",

  // Includes
  INCLUDE_NOT_FOUND = "GS040",
  INCLUDE_PARSE_ERROR = "GS041",

  // Front end
  SYNTAX_ERROR = "GS100",
  AST_CONSTRUCTION = "GS101",
  INVALID_ROOT = "GS102",
  FILE_NOT_FOUND = "GS103",

  NESTING_TOO_DEEP = "GS900",
  INTERNAL_ERROR = "GS999",
}

export const ErrorMessages = {
  UNDECLARED_IDENTIFIER: (name: string) => `Undeclared identifier '${name}'`,
  UNDEFINED_TYPE: (name: string) => `Unknown type '${name}'`,
  NOT_A_TYPE: (name: string) => `'${name}' is not a type`,
  VARIABLE_REDECLARED: (name: string) => `Variable '${name}' is already declared`,
  TYPE_REDECLARED: (name: string) => `Type '${name}' is already declared`,
  FUNCTION_REDEFINED: (name: string) => `Function '${name}' is already defined`,
  FUNCTION_SIGNATURE_MISMATCH: (name: string) =>
    `Redeclaration of function '${name}' does not match its earlier declaration`,
  NOT_A_FUNCTION: (name: string) =>
    `'${name}' is already declared and is not a function`,
  DUPLICATE_MEMBER: (struct: string, member: string) =>
    `Duplicate member '${member}' in struct '${struct}'`,
  DUPLICATE_PARAMETER: (name: string) => `Duplicate parameter '${name}'`,
  CYCLIC_TYPEDEF: (name: string) => `Typedef '${name}' refers to itself`,
  VOID_VARIABLE: (name: string) =>
    `Variable '${name}' cannot be declared with type 'void'`,
  NON_CONSTANT_ARRAY_SIZE:
    "Array size must be a compile-time constant integer expression",
  INVALID_ARRAY_SIZE: (size: number) =>
    `Array size must be positive, but evaluates to ${size}`,
  INITIALIZER_MISMATCH: (name: string, actual: string, expected: string) =>
    `Cannot initialize '${name}' of type '${expected}' with a value of type '${actual}'`,
  ASSIGNMENT_MISMATCH: (actual: string, expected: string) =>
    `Cannot assign '${actual}' to '${expected}'`,
  COMPOUND_ASSIGNMENT_MISMATCH: (
    operator: string,
    result: string,
    target: string,
  ) => `Result '${result}' of '${operator}' cannot be assigned to '${target}'`,
  INVALID_OPERANDS: (operator: string, left: string, right: string) =>
    `Operator '${operator}' cannot be applied to '${left}' and '${right}'`,
  INVALID_OPERAND: (operator: string, operand: string) =>
    `Operator '${operator}' cannot be applied to '${operand}'`,
  INVALID_CONDITION: (construct: string, actual: string) =>
    `Condition of '${construct}' has type '${actual}', which is not convertible to bool`,
  INCOMPATIBLE_BRANCHES: (consequent: string, alternate: string) =>
    `Conditional branches have incompatible types '${consequent}' and '${alternate}'`,
  INVALID_ASSIGNMENT_TARGET: "Left side of assignment is not assignable",
  ASSIGNMENT_TO_CONST: (name: string) => `Cannot assign to const '${name}'`,
  UNSAFE_CAST: (source: string, target: string) =>
    `Cast from '${source}' to '${target}' may be unsafe`,
  NOT_CALLABLE: (callee: string) => `'${callee}' is not a function`,
  ARGUMENT_COUNT: (callee: string, expected: number, actual: number) =>
    `'${callee}' expects ${expected} argument(s) but was given ${actual}`,
  ARGUMENT_TYPE: (position: number, expected: string, actual: string) =>
    `Argument ${position} has type '${actual}' but '${expected}' is expected`,
  INVALID_INDEX: (actual: string) =>
    `Array index must be 'int', not '${actual}'`,
  NOT_INDEXABLE: (actual: string) =>
    `Subscript '[]' applies only to arrays, not '${actual}'`,
  NOT_A_STRUCT: (actual: string) =>
    `Member access '.' applies only to structs, not '${actual}'`,
  INCOMPLETE_STRUCT: (name: string) =>
    `Struct '${name}' is not completely defined`,
  NO_SUCH_MEMBER: (struct: string, member: string) =>
    `Struct '${struct}' has no member '${member}'`,
  RETURN_OUTSIDE_FUNCTION: "'return' outside of a function",
  RETURN_VALUE_IN_VOID: (name: string) =>
    `Void function '${name}' cannot return a value`,
  MISSING_RETURN_VALUE: (name: string, expected: string) =>
    `Function '${name}' must return a value of type '${expected}'`,
  RETURN_TYPE: (name: string, expected: string, actual: string) =>
    `Function '${name}' returns '${expected}' but the value has type '${actual}'`,
  BREAK_OUTSIDE_LOOP: "'break' outside of a loop",
  CONTINUE_OUTSIDE_LOOP: "'continue' outside of a loop",
  INCLUDE_NOT_FOUND: (path: string) => `Include file '${path}' not found`,
  INCLUDE_PARSE_ERROR: (path: string, reason: string) =>
    `Include file '${path}' could not be parsed: ${reason}`,
  AST_CONSTRUCTION: (reason: string) => `Could not build the syntax tree: ${reason}`,
  INVALID_ROOT: (actual: string) =>
    `Expected a translation unit at the root, found '${actual}'`,
  FILE_NOT_FOUND: (path: string) => `Source file '${path}' not found`,
  NESTING_TOO_DEEP: (limit: number) =>
    `Nesting exceeds the maximum depth of ${limit}`,
  INTERNAL_ERROR: (reason: string) =>
    `Internal error during semantic analysis: ${reason}`,
};
