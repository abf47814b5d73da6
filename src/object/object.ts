/**
 * Vela object system - runtime values for the VM.
 *
 * Every value implements the same operator protocol. A binary operation
 * first asks the left operand; when it answers DECLINED the VM asks the
 * right operand's mirrored method, and a second DECLINED is a type error.
 */

import { Chunk } from "../bytecode/chunk.js";
import type { InstructionPointer } from "../bytecode/chunk.js";
import type { Stack } from "../vm/stack.js";
import { VMError } from "../vm/errors.js";

/**
 * Object type enumeration.
 */
export const enum ObjectType {
  Number = "number",
  Bool = "bool",
  Nil = "nil",
  String = "string",
  Path = "path",
  Correction = "correction",
  Algorithm = "algorithm",
  Array = "array",
  Function = "function",
  NativeFunction = "native function",
  Generator = "generator",
  Iterator = "iterator",
  NativeIterator = "native iterator",
  Enum = "enum",
  NativeEnum = "native enum",
  NativeObject = "native object",
}

/** Returned by an operator method that does not handle its operands. */
export const DECLINED: unique symbol = Symbol("declined");

/** Result of an operator method. */
export type OpResult = VelaObject | typeof DECLINED;

/**
 * The parts of the VM a callable needs.
 */
export interface CallContext {
  readonly stack: Stack;
  /** Start executing a compiled function whose stack window begins at `base`. */
  pushFrame(fn: VelaFunction, base: number): void;
}

/**
 * Base interface for all Vela objects.
 */
export interface VelaObject {
  /** Object type identifier. */
  readonly type: ObjectType;
  /** Representation used inside containers and listings. */
  inspect(): string;
  /** Text printed by the `?` operator. */
  toString(): string;
  isTruthy(): boolean;

  negate(): OpResult;
  invert(): OpResult;

  add(other: VelaObject): OpResult;
  rAdd(other: VelaObject): OpResult;
  sub(other: VelaObject): OpResult;
  rSub(other: VelaObject): OpResult;
  power(other: VelaObject): OpResult;
  rPower(other: VelaObject): OpResult;
  mix(other: VelaObject): OpResult;
  rMix(other: VelaObject): OpResult;
  equal(other: VelaObject): OpResult;
  less(other: VelaObject): OpResult;
  more(other: VelaObject): OpResult;

  /**
   * Call this value with `argCount` arguments sitting above it on the
   * stack. Returns false when the value is not callable.
   */
  call(ctx: CallContext, argCount: number): boolean;
}

/**
 * Declines every operation. Variants override what they support.
 */
export abstract class BaseObject implements VelaObject {
  abstract readonly type: ObjectType;
  abstract inspect(): string;

  toString(): string {
    return this.inspect();
  }

  isTruthy(): boolean {
    return true;
  }

  negate(): OpResult {
    return DECLINED;
  }

  invert(): OpResult {
    return DECLINED;
  }

  add(_other: VelaObject): OpResult {
    return DECLINED;
  }

  rAdd(_other: VelaObject): OpResult {
    return DECLINED;
  }

  sub(_other: VelaObject): OpResult {
    return DECLINED;
  }

  rSub(_other: VelaObject): OpResult {
    return DECLINED;
  }

  power(_other: VelaObject): OpResult {
    return DECLINED;
  }

  rPower(_other: VelaObject): OpResult {
    return DECLINED;
  }

  mix(_other: VelaObject): OpResult {
    return DECLINED;
  }

  rMix(_other: VelaObject): OpResult {
    return DECLINED;
  }

  equal(_other: VelaObject): OpResult {
    return DECLINED;
  }

  less(_other: VelaObject): OpResult {
    return DECLINED;
  }

  more(_other: VelaObject): OpResult {
    return DECLINED;
  }

  call(_ctx: CallContext, _argCount: number): boolean {
    return false;
  }
}

// =============================================================================
// Scalars
// =============================================================================

/**
 * Nil singleton, written `void` in source.
 */
export class VelaNil extends BaseObject {
  readonly type = ObjectType.Nil;

  inspect(): string {
    return "void";
  }

  isTruthy(): boolean {
    return false;
  }

  equal(other: VelaObject): OpResult {
    return toBool(other instanceof VelaNil);
  }
}

/** The singleton nil value. */
export const NIL = Object.freeze(new VelaNil());

/**
 * Boolean value.
 */
export class VelaBool extends BaseObject {
  readonly type = ObjectType.Bool;

  constructor(public readonly value: boolean) {
    super();
  }

  inspect(): string {
    return this.value ? "true" : "false";
  }

  isTruthy(): boolean {
    return this.value;
  }

  invert(): OpResult {
    return toBool(!this.value);
  }

  equal(other: VelaObject): OpResult {
    if (other instanceof VelaBool) {
      return toBool(other.value === this.value);
    }
    // true equals 1 and false equals 0
    if (other instanceof VelaNumber) {
      return toBool(other.value === (this.value ? 1 : 0));
    }
    return DECLINED;
  }
}

/** Singleton true value. */
export const TRUE = Object.freeze(new VelaBool(true));
/** Singleton false value. */
export const FALSE = Object.freeze(new VelaBool(false));

/** Get boolean singleton. */
export function toBool(value: boolean): VelaBool {
  return value ? TRUE : FALSE;
}

/**
 * Number value. Integers and fractions share one representation.
 */
export class VelaNumber extends BaseObject {
  readonly type = ObjectType.Number;

  constructor(public readonly value: number) {
    super();
  }

  inspect(): string {
    return String(this.value);
  }

  isTruthy(): boolean {
    return this.value !== 0;
  }

  negate(): OpResult {
    return new VelaNumber(-this.value);
  }

  add(other: VelaObject): OpResult {
    return other instanceof VelaNumber ? new VelaNumber(this.value + other.value) : DECLINED;
  }

  sub(other: VelaObject): OpResult {
    return other instanceof VelaNumber ? new VelaNumber(this.value - other.value) : DECLINED;
  }

  /**
   * Scientific shift: `a ^ b` is a × 10^b for an integral b.
   */
  power(other: VelaObject): OpResult {
    if (!(other instanceof VelaNumber) || !Number.isInteger(other.value)) {
      return DECLINED;
    }
    const result = this.value * 10 ** other.value;
    if (!Number.isFinite(result)) {
      throw new VMError(`${this.inspect()} ^ ${other.inspect()} is out of range`);
    }
    return new VelaNumber(result);
  }

  /** Bitwise or of two integers, without 32-bit wrapping. */
  mix(other: VelaObject): OpResult {
    if (
      !(other instanceof VelaNumber) ||
      !Number.isInteger(this.value) ||
      !Number.isInteger(other.value)
    ) {
      return DECLINED;
    }
    return new VelaNumber(Number(BigInt(this.value) | BigInt(other.value)));
  }

  equal(other: VelaObject): OpResult {
    return other instanceof VelaNumber ? toBool(this.value === other.value) : DECLINED;
  }

  less(other: VelaObject): OpResult {
    return other instanceof VelaNumber ? toBool(this.value < other.value) : DECLINED;
  }

  more(other: VelaObject): OpResult {
    return other instanceof VelaNumber ? toBool(this.value > other.value) : DECLINED;
  }
}

/**
 * String value.
 */
export class VelaString extends BaseObject {
  readonly type = ObjectType.String;

  constructor(public readonly value: string) {
    super();
  }

  inspect(): string {
    return `"${this.value}"`;
  }

  toString(): string {
    return this.value;
  }

  isTruthy(): boolean {
    return this.value.length > 0;
  }

  add(other: VelaObject): OpResult {
    return other instanceof VelaString ? new VelaString(this.value + other.value) : DECLINED;
  }

  equal(other: VelaObject): OpResult {
    return other instanceof VelaString ? toBool(this.value === other.value) : DECLINED;
  }
}

/**
 * Filesystem path value, written with single quotes.
 */
export class VelaPath extends BaseObject {
  readonly type = ObjectType.Path;

  constructor(public readonly value: string) {
    super();
  }

  inspect(): string {
    return `'${this.value}'`;
  }

  toString(): string {
    return this.value;
  }

  isTruthy(): boolean {
    return this.value.length > 0;
  }

  equal(other: VelaObject): OpResult {
    return other instanceof VelaPath ? toBool(this.value === other.value) : DECLINED;
  }
}

/** Kinds of keyword tag. */
export type TagType = ObjectType.Correction | ObjectType.Algorithm;

/**
 * A correction-name or distance-algorithm tag such as `drift` or `Euclidean`.
 */
export class VelaTag extends BaseObject {
  constructor(
    public readonly type: TagType,
    public readonly name: string
  ) {
    super();
  }

  inspect(): string {
    return this.name;
  }

  equal(other: VelaObject): OpResult {
    if (other instanceof VelaTag) {
      return toBool(other.type === this.type && other.name === this.name);
    }
    return DECLINED;
  }
}

// =============================================================================
// Containers
// =============================================================================

/**
 * Mutable ordered sequence of values.
 */
export class VelaArray extends BaseObject {
  readonly type = ObjectType.Array;

  constructor(public readonly elements: VelaObject[]) {
    super();
  }

  inspect(): string {
    return `[${this.elements.map((e) => e.inspect()).join(", ")}]`;
  }

  isTruthy(): boolean {
    return this.elements.length > 0;
  }

  /** Reversed copy. */
  invert(): OpResult {
    return new VelaArray([...this.elements].reverse());
  }

  /** Concatenation. */
  mix(other: VelaObject): OpResult {
    return other instanceof VelaArray
      ? new VelaArray([...this.elements, ...other.elements])
      : DECLINED;
  }

  equal(other: VelaObject): OpResult {
    if (!(other instanceof VelaArray)) {
      return DECLINED;
    }
    if (other.elements.length !== this.elements.length) {
      return FALSE;
    }
    return toBool(this.elements.every((e, i) => valuesEqual(e, other.elements[i] ?? NIL)));
  }
}

/**
 * Equality through the operator protocol. Operands that both decline
 * are unequal.
 */
export function valuesEqual(a: VelaObject, b: VelaObject): boolean {
  let result = a.equal(b);
  if (result === DECLINED) {
    result = b.equal(a);
  }
  return result !== DECLINED && result.isTruthy();
}

/**
 * Enumeration declared in source. Member values are their indices.
 */
export class VelaEnum extends BaseObject {
  readonly type = ObjectType.Enum;
  readonly members: string[] = [];

  constructor(public readonly name: string) {
    super();
  }

  inspect(): string {
    return `<enum ${this.name}>`;
  }

  addMember(member: string): void {
    if (this.members.includes(member)) {
      throw new VMError(`${this.inspect()} already has a member '${member}'`);
    }
    this.members.push(member);
  }

  getField(member: string): VelaObject | undefined {
    const index = this.members.indexOf(member);
    return index < 0 ? undefined : new VelaNumber(index);
  }
}

/**
 * Mirror of a host enumeration.
 */
export class VelaNativeEnum extends BaseObject {
  readonly type = ObjectType.NativeEnum;
  private readonly members: ReadonlyMap<string, number>;

  constructor(
    public readonly name: string,
    members: Record<string, number>
  ) {
    super();
    this.members = new Map(Object.entries(members));
  }

  inspect(): string {
    return `<enum ${this.name}>`;
  }

  getField(member: string): VelaObject | undefined {
    const value = this.members.get(member);
    return value === undefined ? undefined : new VelaNumber(value);
  }
}

/**
 * Opaque host value.
 */
export class VelaNativeObject extends BaseObject {
  readonly type = ObjectType.NativeObject;

  constructor(
    public readonly value: unknown,
    public readonly label: string
  ) {
    super();
  }

  inspect(): string {
    return `<${this.label}>`;
  }

  equal(other: VelaObject): OpResult {
    return other instanceof VelaNativeObject ? toBool(other.value === this.value) : DECLINED;
  }
}

// =============================================================================
// Callables
// =============================================================================

/**
 * Compiled function.
 */
export class VelaFunction extends BaseObject {
  readonly type = ObjectType.Function;
  readonly chunk: Chunk = new Chunk();
  arity: number = 0;

  /** Name shown in tracebacks; empty for the top-level script. */
  constructor(public readonly name: string) {
    super();
  }

  inspect(): string {
    return this.name === "" ? "<script>" : `<fn ${this.name}>`;
  }

  call(ctx: CallContext, argCount: number): boolean {
    checkArity(this, this.arity, argCount);
    ctx.pushFrame(this, ctx.stack.top - argCount - 1);
    return true;
  }
}

/** Host callback behind a native function. */
export type NativeFn = (args: VelaObject[]) => VelaObject;

/**
 * Function implemented by the host.
 */
export class VelaNativeFunction extends BaseObject {
  readonly type = ObjectType.NativeFunction;

  /** A null arity accepts any number of arguments. */
  constructor(
    public readonly name: string,
    public readonly arity: number | null,
    public readonly fn: NativeFn
  ) {
    super();
  }

  inspect(): string {
    return `<native fn ${this.name}>`;
  }

  call(ctx: CallContext, argCount: number): boolean {
    if (this.arity !== null) {
      checkArity(this, this.arity, argCount);
    }
    const base = ctx.stack.top - argCount - 1;
    const args = ctx.stack.slice(base + 1);
    const result = this.fn(args);
    ctx.stack.truncate(base);
    ctx.stack.push(result);
    return true;
  }
}

/**
 * A suspended generator frame: its stack window (slot 0 onward) and where
 * to resume. A null `ip` means the body has not started.
 */
export interface SavedFrame {
  slots: VelaObject[];
  ip: InstructionPointer | null;
}

/**
 * Generator declared with `iter`. Calling it yields a primed copy,
 * wrapped in an Iterator, without running any of the body.
 */
export class VelaGenerator extends BaseObject {
  readonly type = ObjectType.Generator;
  private exhausted: boolean = false;

  constructor(
    public readonly fn: VelaFunction,
    private saved: SavedFrame | null = null
  ) {
    super();
  }

  inspect(): string {
    return `<iter ${this.fn.name}>`;
  }

  call(ctx: CallContext, argCount: number): boolean {
    checkArity(this, this.fn.arity, argCount);
    const base = ctx.stack.top - argCount - 1;
    const slots = ctx.stack.slice(base);
    ctx.stack.truncate(base);
    ctx.stack.push(new VelaIterator(new VelaGenerator(this.fn, { slots, ip: null })));
    return true;
  }

  get isExhausted(): boolean {
    return this.exhausted;
  }

  /** Take the saved frame for resumption. */
  resume(): SavedFrame {
    if (this.saved === null || this.exhausted) {
      throw new VMError(`${this.inspect()} has no frame to resume`);
    }
    const saved = this.saved;
    this.saved = null;
    return saved;
  }

  suspend(frame: SavedFrame): void {
    this.saved = frame;
  }

  finish(): void {
    this.exhausted = true;
    this.saved = null;
  }
}

/**
 * Iterator over a primed generator.
 */
export class VelaIterator extends BaseObject {
  readonly type = ObjectType.Iterator;

  constructor(public readonly generator: VelaGenerator) {
    super();
  }

  inspect(): string {
    return `<iterator ${this.generator.fn.name}>`;
  }
}

/**
 * Iterator over host-provided values.
 */
export class VelaNativeIterator extends BaseObject {
  readonly type = ObjectType.NativeIterator;
  private readonly source: Iterator<VelaObject>;

  constructor(items: Iterable<VelaObject>) {
    super();
    this.source = items[Symbol.iterator]();
  }

  inspect(): string {
    return "<native iterator>";
  }

  /** The next item, or undefined once exhausted. */
  next(): VelaObject | undefined {
    const result = this.source.next();
    return result.done === true ? undefined : result.value;
  }
}

function checkArity(callee: VelaObject, arity: number, argCount: number): void {
  if (argCount !== arity) {
    throw new VMError(`${callee.inspect()} expected ${arity} arguments, got ${argCount}`);
  }
}
