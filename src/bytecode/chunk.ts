/**
 * Compiled bytecode container.
 */

import type { VelaObject } from "../object/object.js";

/**
 * A function's instruction words, constant pool and line table.
 *
 * Opcodes and operands are stored uniformly as words. Every word has a
 * matching entry in the line table.
 */
export class Chunk {
  /** Opcodes and operands. */
  readonly code: number[] = [];

  /** Constant pool. Indices never change once assigned. */
  readonly constants: VelaObject[] = [];

  /** Source line (1-indexed) of each word in `code`. */
  readonly lines: number[] = [];

  private readonly constantKeys: Map<string, number> = new Map();

  get length(): number {
    return this.code.length;
  }

  /**
   * Append one word and return its offset.
   */
  write(word: number, line: number): number {
    const offset = this.code.length;
    this.code.push(word);
    this.lines.push(line);
    return offset;
  }

  /**
   * Overwrite the word at an offset.
   */
  patch(offset: number, word: number): void {
    if (offset < 0 || offset >= this.code.length) {
      throw new RangeError(`patch offset ${offset} out of range`);
    }
    this.code[offset] = word;
  }

  /**
   * Add a constant and return its index. Constants added with the same
   * key share one slot.
   */
  addConstant(value: VelaObject, key?: string): number {
    if (key !== undefined) {
      const existing = this.constantKeys.get(key);
      if (existing !== undefined) {
        return existing;
      }
    }
    const index = this.constants.length;
    this.constants.push(value);
    if (key !== undefined) {
      this.constantKeys.set(key, index);
    }
    return index;
  }

  constant(index: number): VelaObject {
    const value = this.constants[index];
    if (value === undefined) {
      throw new RangeError(`constant index ${index} out of range`);
    }
    return value;
  }

  /** Source line of the word at an offset, or 0 when unknown. */
  line(offset: number): number {
    return this.lines[offset] ?? 0;
  }
}

/**
 * A cursor over a chunk's words.
 */
export class InstructionPointer {
  readonly chunk: Chunk;
  private index: number;

  constructor(chunk: Chunk, index: number = 0) {
    this.chunk = chunk;
    this.index = index;
  }

  /** Offset of the next word to be read. */
  get position(): number {
    return this.index;
  }

  isAtEnd(): boolean {
    return this.index >= this.chunk.length;
  }

  /**
   * Read the next word and move past it.
   */
  advance(): number {
    const word = this.chunk.code[this.index];
    if (word === undefined) {
      throw new RangeError("instruction pointer ran past the end of the chunk");
    }
    this.index++;
    return word;
  }

  /**
   * Look at a word ahead of the cursor without moving. `distance` 1 is
   * the next word to be read.
   */
  peek(distance: number = 1): number | undefined {
    if (distance < 1) {
      throw new RangeError("peek distance must be at least 1");
    }
    return this.chunk.code[this.index + distance - 1];
  }

  /** The word most recently read. */
  previous(): number | undefined {
    return this.chunk.code[this.index - 1];
  }

  /** Move the cursor by a signed number of words. */
  jump(offset: number): void {
    const target = this.index + offset;
    if (target < 0 || target > this.chunk.length) {
      throw new RangeError(`jump to ${target} is outside the chunk`);
    }
    this.index = target;
  }

  /** Source line of the word most recently read. */
  line(): number {
    return this.chunk.line(this.index - 1);
  }

  copy(): InstructionPointer {
    return new InstructionPointer(this.chunk, this.index);
  }
}
