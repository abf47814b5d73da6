/**
 * Operand stack shared by every frame of a VM run.
 */

import type { VelaObject } from "../object/object.js";
import { VMError } from "./errors.js";

/** Maximum number of values on the stack. */
export const MAX_STACK_DEPTH = 4096;

/**
 * A growable sequence of values. Frames address their own window of it
 * by absolute index; the window's bottom is the frame's base.
 */
export class Stack {
  private readonly values: VelaObject[] = [];

  /** Index one past the topmost value. */
  get top(): number {
    return this.values.length;
  }

  push(value: VelaObject): void {
    if (this.values.length >= MAX_STACK_DEPTH) {
      throw new VMError("stack overflow");
    }
    this.values.push(value);
  }

  pushAll(values: readonly VelaObject[]): void {
    if (this.values.length + values.length > MAX_STACK_DEPTH) {
      throw new VMError("stack overflow");
    }
    this.values.push(...values);
  }

  /**
   * Pop the top value. Popping at or below `floor` is an underflow.
   */
  pop(floor: number = 0): VelaObject {
    if (this.values.length <= floor) {
      throw new VMError("stack underflow");
    }
    const value = this.values.pop();
    if (value === undefined) {
      throw new VMError("stack underflow");
    }
    return value;
  }

  /** Value `distance` below the top without removing it. */
  peek(distance: number = 0): VelaObject {
    return this.get(this.values.length - 1 - distance);
  }

  get(index: number): VelaObject {
    const value = this.values[index];
    if (value === undefined) {
      throw new VMError(`stack slot ${index} is out of range`);
    }
    return value;
  }

  set(index: number, value: VelaObject): void {
    if (index < 0 || index >= this.values.length) {
      throw new VMError(`stack slot ${index} is out of range`);
    }
    this.values[index] = value;
  }

  /** Copy of the values from `start` to the top. */
  slice(start: number): VelaObject[] {
    return this.values.slice(start);
  }

  /** Drop everything at and above `length`. */
  truncate(length: number): void {
    if (length < this.values.length) {
      this.values.length = Math.max(length, 0);
    }
  }

  clear(): void {
    this.values.length = 0;
  }
}
