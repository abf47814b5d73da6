/**
 * Call frame management for the Vela VM.
 */

import { InstructionPointer } from "../bytecode/chunk.js";
import type { VelaFunction, VelaIterator, VelaObject } from "../object/object.js";

/**
 * Links a generator frame to the loop that is pulling values from it.
 */
export interface IteratorDriver {
  /** The iterator whose generator runs in this frame. */
  readonly iterator: VelaIterator;
  /** Offset of the caller's Advance instruction. */
  readonly advanceAt: number;
}

/**
 * A call frame representing a function invocation.
 */
export class CallFrame {
  /** Instruction pointer - current position in bytecode. */
  readonly ip: InstructionPointer;
  /** Base pointer - slot 0 of this frame's stack window (the callee). */
  readonly base: number;
  /** The function being executed. */
  readonly fn: VelaFunction;
  /** Set when this frame runs a generator body for a foreach loop. */
  readonly driver: IteratorDriver | null;

  constructor(
    fn: VelaFunction,
    base: number,
    ip: InstructionPointer = new InstructionPointer(fn.chunk),
    driver: IteratorDriver | null = null
  ) {
    this.fn = fn;
    this.base = base;
    this.ip = ip;
    this.driver = driver;
  }

  /** Name used in tracebacks. */
  get name(): string {
    return this.fn.name === "" ? "script" : this.fn.name;
  }

  /**
   * Read the next word and advance IP.
   */
  read(): number {
    return this.ip.advance();
  }

  /**
   * Read a constant-index operand and return the constant.
   */
  readConstant(): VelaObject {
    return this.fn.chunk.constant(this.ip.advance());
  }

  isAtEnd(): boolean {
    return this.ip.isAtEnd();
  }

  /** Source line of the instruction being executed. */
  line(): number {
    return this.ip.line();
  }

  /** Absolute stack index of a local slot. */
  slot(index: number): number {
    return this.base + index;
  }
}
