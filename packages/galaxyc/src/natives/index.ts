/**
 * Native function signatures provided by the host
 */

export {
  NativeLoader,
  nativeType,
  type NativeDefinition,
  type NativeDefinitions,
} from "./loader.js";
