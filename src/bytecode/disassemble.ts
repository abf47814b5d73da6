/**
 * Human-readable listings of compiled chunks.
 */

import { Chunk } from "./chunk.js";
import { OperandKind, isKnownOp, opName, operandKind } from "./opcode.js";
import { VelaFunction, VelaGenerator } from "../object/object.js";

const NAME_WIDTH = 12;

/**
 * Render the instruction at `offset` and return the offset of the next one.
 *
 *   0000    1 Constant     0 (3)
 *   0002    | DefineGlobal 1 ("x")
 *   0006    2 JumpIfFalse  4 -> 12
 */
export function disassembleInstruction(
  chunk: Chunk,
  offset: number
): { text: string; next: number } {
  const line = chunk.line(offset);
  const linePart =
    offset > 0 && chunk.line(offset - 1) === line ? "   |" : String(line).padStart(4, " ");
  const prefix = `${String(offset).padStart(4, "0")} ${linePart} `;

  const op = chunk.code[offset] ?? 0;
  const kind = isKnownOp(op) ? operandKind(op) : OperandKind.None;
  if (kind === OperandKind.None) {
    return { text: prefix + opName(op), next: offset + 1 };
  }

  const operand = chunk.code[offset + 1] ?? 0;
  const head = `${prefix}${opName(op).padEnd(NAME_WIDTH)} ${operand}`;
  let detail = "";
  switch (kind) {
    case OperandKind.Constant: {
      const value = chunk.constants[operand];
      detail = value === undefined ? " (?)" : ` (${value.inspect()})`;
      break;
    }
    case OperandKind.Jump:
      detail = ` -> ${offset + 2 + operand}`;
      break;
    case OperandKind.Loop:
      detail = ` -> ${offset + 2 - operand}`;
      break;
  }
  return { text: head + detail, next: offset + 2 };
}

/**
 * Render a whole chunk under a `== name ==` header.
 */
export function disassembleChunk(chunk: Chunk, name: string): string[] {
  const lines = [`== ${name} ==`];
  let offset = 0;
  while (offset < chunk.length) {
    const { text, next } = disassembleInstruction(chunk, offset);
    lines.push(text);
    offset = next;
  }
  return lines;
}

/**
 * Render a function followed by every function and generator in its
 * constant pool, depth first.
 */
export function disassemble(fn: VelaFunction): string[] {
  const lines = disassembleChunk(fn.chunk, fn.name === "" ? "script" : fn.name);
  for (const constant of fn.chunk.constants) {
    if (constant instanceof VelaFunction) {
      lines.push(...disassemble(constant));
    } else if (constant instanceof VelaGenerator) {
      lines.push(...disassemble(constant.fn));
    }
  }
  return lines;
}
