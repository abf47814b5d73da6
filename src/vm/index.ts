/**
 * VM module exports.
 */

export { VM, InterpretResult } from "./vm.js";
export type { VMConfig, InstrumentHost, DomainAction } from "./vm.js";
export { VMError } from "./errors.js";
export type { RuntimeFailure } from "./errors.js";
export { CallFrame } from "./frame.js";
export type { IteratorDriver } from "./frame.js";
export { Stack, MAX_STACK_DEPTH } from "./stack.js";
