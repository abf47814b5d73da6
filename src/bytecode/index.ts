/**
 * Bytecode module exports.
 */

export { Op, OperandKind, isKnownOp, operandKind, operandCount, opName } from "./opcode.js";
export { Chunk, InstructionPointer } from "./chunk.js";
export { disassemble, disassembleChunk, disassembleInstruction } from "./disassemble.js";
