export { Diagnostic, type DiagnosticOptions } from "./diagnostic.js";
export { DiagnosticBag } from "./bag.js";
export { ErrorCode, ErrorMessages } from "./codes.js";
