/**
 * Local-variable tracking for one function being compiled.
 */

import { VelaFunction } from "../object/object.js";
import type { Chunk } from "../bytecode/chunk.js";

/** Maximum number of locals one function may hold at once. */
export const MAX_LOCALS = 256;

/**
 * What kind of body is being compiled.
 */
export const enum FunctionKind {
  Script = "script",
  Function = "function",
  Generator = "generator",
}

/**
 * A declared local variable.
 */
export interface Local {
  /** Variable name. */
  name: string;
  /** Block depth it was declared at, or -1 until its initializer is compiled. */
  depth: number;
}

/**
 * Result of resolving a name against the locals.
 */
export interface LocalResolution {
  slot: number;
  initialized: boolean;
}

/**
 * Locals and block depth for one function. Scopes chain to the function
 * that encloses them; lookups never cross that chain.
 */
export class FunctionScope {
  readonly enclosing: FunctionScope | null;
  readonly kind: FunctionKind;
  readonly fn: VelaFunction;

  /** Slot 0 holds the callee itself. */
  private readonly locals: Local[] = [{ name: "", depth: 0 }];
  private depth: number = 0;

  constructor(kind: FunctionKind, name: string, enclosing: FunctionScope | null) {
    this.kind = kind;
    this.enclosing = enclosing;
    this.fn = new VelaFunction(name);
  }

  get chunk(): Chunk {
    return this.fn.chunk;
  }

  get scopeDepth(): number {
    return this.depth;
  }

  get localCount(): number {
    return this.locals.length;
  }

  beginScope(): void {
    this.depth++;
  }

  /**
   * Close the innermost block and return how many locals it held.
   */
  endScope(): number {
    this.depth--;
    let removed = 0;
    for (;;) {
      const last = this.locals[this.locals.length - 1];
      if (last === undefined || last.depth <= this.depth || this.locals.length === 1) {
        return removed;
      }
      this.locals.pop();
      removed++;
    }
  }

  /**
   * Whether a name is already declared in the innermost block.
   */
  isDeclaredInCurrentBlock(name: string): boolean {
    for (let i = this.locals.length - 1; i > 0; i--) {
      const local = this.locals[i];
      if (local === undefined || (local.depth !== -1 && local.depth < this.depth)) {
        return false;
      }
      if (local.name === name) {
        return true;
      }
    }
    return false;
  }

  /**
   * Add an uninitialized local and return its slot.
   */
  addLocal(name: string): number {
    if (this.locals.length >= MAX_LOCALS) {
      throw new RangeError("Too many local variables in function");
    }
    this.locals.push({ name, depth: -1 });
    return this.locals.length - 1;
  }

  /** Mark the most recent local as usable. */
  markInitialized(): void {
    const last = this.locals[this.locals.length - 1];
    if (this.depth > 0 && last !== undefined) {
      last.depth = this.depth;
    }
  }

  /**
   * Find a local by walking from the most recent declaration backward.
   */
  resolveLocal(name: string): LocalResolution | undefined {
    for (let i = this.locals.length - 1; i > 0; i--) {
      const local = this.locals[i];
      if (local !== undefined && local.name === name) {
        return { slot: i, initialized: local.depth !== -1 };
      }
    }
    return undefined;
  }
}
