/**
 * Compiler module exports.
 */

export { Compiler, CompileError, compile } from "./compiler.js";
export type { CompileResult } from "./compiler.js";

export { FunctionScope, FunctionKind, MAX_LOCALS } from "./scope.js";
export type { Local, LocalResolution } from "./scope.js";
