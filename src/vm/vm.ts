/**
 * Vela Virtual Machine - stack-based bytecode interpreter.
 */

import { setTimeout as delay } from "timers/promises";
import { Op, isKnownOp, operandCount } from "../bytecode/opcode.js";
import { compile } from "../compiler/compiler.js";
import {
  CallContext,
  DECLINED,
  FALSE,
  NIL,
  OpResult,
  TRUE,
  VelaArray,
  VelaEnum,
  VelaFunction,
  VelaIterator,
  VelaNativeEnum,
  VelaNativeIterator,
  VelaNumber,
  VelaObject,
  VelaString,
} from "../object/object.js";
import { CallFrame } from "./frame.js";
import { Stack } from "./stack.js";
import { RuntimeFailure, VMError } from "./errors.js";

/** Maximum call depth. */
const MAX_FRAME_DEPTH = 256;

/**
 * Terminal state of a run.
 */
export const enum InterpretResult {
  Ok = "OK",
  CompileError = "COMPILE_ERROR",
  RuntimeError = "RUNTIME_ERROR",
}

/** Instrument operations triggered by the action keywords. */
export type DomainAction = "survey" | "segment" | "filter" | "mark" | "manage" | "scan";

/**
 * Operations the embedding application provides. Each may be async;
 * the VM waits for it before executing the next instruction.
 */
export interface InstrumentHost {
  survey(): void | Promise<void>;
  segment(): void | Promise<void>;
  filter(): void | Promise<void>;
  mark(): void | Promise<void>;
  manage(): void | Promise<void>;
  scan(): void | Promise<void>;
  /** Suspend for a number of seconds. */
  wait(seconds: number): void | Promise<void>;
}

/**
 * VM configuration options.
 */
export interface VMConfig {
  /** Global variables seeded before the first run. */
  globals?: Map<string, VelaObject> | Record<string, VelaObject>;
  /** Called after every assignment to an existing global. */
  onVariableChange?: (name: string, value: VelaObject) => void;
  /** Called for codes outside the instruction set. Throws by default. */
  onUnknownOpcode?: (code: number) => void;
  /** Receives one line per print. Defaults to console.log. */
  output?: (line: string) => void;
  /** Receives diagnostics. Defaults to console.error. */
  errorOutput?: (line: string) => void;
  /** Instrument bindings. Unbound actions fail at run time. */
  host?: Partial<InstrumentHost>;
}

interface BinaryOperator {
  name: string;
  apply(left: VelaObject, right: VelaObject): OpResult;
  mirror(left: VelaObject, right: VelaObject): OpResult;
}

const binaryOperators: ReadonlyMap<number, BinaryOperator> = new Map<number, BinaryOperator>([
  [Op.Power, { name: "exponent", apply: (a, b) => a.power(b), mirror: (a, b) => b.rPower(a) }],
  [Op.Add, { name: "add", apply: (a, b) => a.add(b), mirror: (a, b) => b.rAdd(a) }],
  [Op.Sub, { name: "subtract", apply: (a, b) => a.sub(b), mirror: (a, b) => b.rSub(a) }],
  [Op.Mix, { name: "mix", apply: (a, b) => a.mix(b), mirror: (a, b) => b.rMix(a) }],
  [Op.Equal, { name: "equality", apply: (a, b) => a.equal(b), mirror: (a, b) => b.equal(a) }],
  [Op.Less, { name: "less than", apply: (a, b) => a.less(b), mirror: (a, b) => b.more(a) }],
  [Op.More, { name: "greater than", apply: (a, b) => a.more(b), mirror: (a, b) => b.less(a) }],
]);

const actions: ReadonlyMap<number, DomainAction> = new Map<number, DomainAction>([
  [Op.Survey, "survey"],
  [Op.Segment, "segment"],
  [Op.Filter, "filter"],
  [Op.Mark, "mark"],
  [Op.Manage, "manage"],
  [Op.Scan, "scan"],
]);

/**
 * Vela Virtual Machine.
 *
 * One instance owns its globals; they persist across runs. A VM must
 * not be driven by more than one run at a time.
 */
export class VM implements CallContext {
  readonly stack: Stack = new Stack();
  private frames: CallFrame[] = [];
  private readonly globals: Map<string, VelaObject>;
  private readonly host: Partial<InstrumentHost>;
  private readonly output: (line: string) => void;
  private readonly errorOutput: (line: string) => void;
  private readonly onVariableChange: ((name: string, value: VelaObject) => void) | undefined;
  private readonly onUnknownOpcode: (code: number) => void;

  /** Offset of the Advance whose loop is being skipped, or null. */
  private skipping: number | null = null;
  private running: boolean = false;

  /** The failure from the most recent run, if it ended in one. */
  lastError: RuntimeFailure | null = null;

  constructor(config: VMConfig = {}) {
    const globals = config.globals ?? {};
    this.globals = globals instanceof Map ? new Map(globals) : new Map(Object.entries(globals));
    this.host = { wait: (seconds: number) => delay(seconds * 1000), ...config.host };
    this.output = config.output ?? ((line) => console.log(line));
    this.errorOutput = config.errorOutput ?? ((line) => console.error(line));
    this.onVariableChange = config.onVariableChange;
    this.onUnknownOpcode =
      config.onUnknownOpcode ??
      ((code) => {
        throw new VMError(`Unhandled opcode ${code}`);
      });
  }

  /**
   * Lex, compile and execute source text.
   */
  async run(source: string): Promise<InterpretResult> {
    const { script, errors } = compile(source);
    if (script === null) {
      for (const err of errors) {
        this.errorOutput(`Syntax Error: ${err.message}`);
      }
      return InterpretResult.CompileError;
    }
    return this.interpret(script);
  }

  /**
   * Execute an already compiled script.
   */
  async interpret(script: VelaFunction): Promise<InterpretResult> {
    if (this.running) {
      throw new Error("VM is already running");
    }
    this.running = true;
    this.stack.clear();
    this.frames = [];
    this.skipping = null;
    this.lastError = null;

    try {
      this.stack.push(script);
      this.pushFrame(script, 0);
      await this.execute();
      return InterpretResult.Ok;
    } catch (err) {
      this.reportFailure(err);
      return InterpretResult.RuntimeError;
    } finally {
      this.running = false;
    }
  }

  getGlobal(name: string): VelaObject | undefined {
    return this.globals.get(name);
  }

  setGlobal(name: string, value: VelaObject): void {
    this.globals.set(name, value);
  }

  /**
   * Push a call frame for a compiled function.
   */
  pushFrame(fn: VelaFunction, base: number): void {
    this.pushCallFrame(new CallFrame(fn, base));
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private get frame(): CallFrame {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      throw new VMError("no active call frame");
    }
    return frame;
  }

  private async execute(): Promise<void> {
    for (;;) {
      const frame = this.frame;
      const op = frame.read();

      if (this.skipping !== null) {
        this.skipInstruction(frame, op);
        continue;
      }

      switch (op) {
        // Literals
        case Op.Constant:
          this.push(frame.readConstant());
          break;
        case Op.True:
          this.push(TRUE);
          break;
        case Op.False:
          this.push(FALSE);
          break;
        case Op.Nil:
          this.push(NIL);
          break;

        // Operators
        case Op.Negate:
          this.unary("negate", (v) => v.negate());
          break;
        case Op.Invert:
          this.unary("invert", (v) => v.invert());
          break;
        case Op.Power:
        case Op.Add:
        case Op.Sub:
        case Op.Mix:
        case Op.Equal:
        case Op.Less:
        case Op.More:
          this.binary(op);
          break;
        case Op.Print:
          this.output(this.stack.peek().toString());
          break;

        // Variables
        case Op.DefineGlobal:
          this.globals.set(this.readName(frame), this.pop());
          break;
        case Op.GetGlobal: {
          const name = this.readName(frame);
          const value = this.globals.get(name);
          if (value === undefined) {
            throw new VMError(`Undefined variable '${name}'`);
          }
          this.push(value);
          break;
        }
        case Op.SetGlobal: {
          const name = this.readName(frame);
          if (!this.globals.has(name)) {
            throw new VMError(`Undefined variable '${name}'`);
          }
          const value = this.stack.peek();
          this.globals.set(name, value);
          this.onVariableChange?.(name, value);
          break;
        }
        case Op.GetLocal:
          this.push(this.stack.get(frame.slot(frame.read())));
          break;
        case Op.SetLocal:
          this.stack.set(frame.slot(frame.read()), this.stack.peek());
          break;

        // Control flow
        case Op.Loop:
          frame.ip.jump(-frame.read());
          break;
        case Op.JumpIfFalse: {
          const offset = frame.read();
          if (!this.stack.peek().isTruthy()) {
            frame.ip.jump(offset);
          }
          break;
        }
        case Op.Jump:
          frame.ip.jump(frame.read());
          break;
        case Op.Advance:
          this.advance(frame);
          break;
        case Op.Pop:
          this.pop();
          break;

        // Objects
        case Op.Enum:
          this.push(new VelaEnum(this.readName(frame)));
          break;
        case Op.GetField:
          this.getField(this.readName(frame));
          break;
        case Op.DefineField: {
          const member = this.readName(frame);
          const target = this.stack.peek();
          if (!(target instanceof VelaEnum)) {
            throw new VMError("Can only add members to enumerations");
          }
          target.addMember(member);
          break;
        }
        case Op.BuildArray: {
          const count = frame.read();
          const start = this.stack.top - count;
          if (start <= frame.base) {
            throw new VMError("stack underflow");
          }
          const elements = this.stack.slice(start);
          this.stack.truncate(start);
          this.push(new VelaArray(elements));
          break;
        }

        // Calls
        case Op.Return:
          if (this.returnFromFrame()) {
            return;
          }
          break;
        case Op.Call: {
          const argCount = frame.read();
          const callee = this.stack.peek(argCount);
          if (!callee.call(this, argCount)) {
            throw new VMError(`'${callee.type}' objects aren't callable`);
          }
          break;
        }
        case Op.Yield:
          this.yieldFromFrame();
          break;

        // Host interaction
        case Op.Wait: {
          const seconds = this.pop();
          if (!(seconds instanceof VelaNumber) || seconds.value < 0) {
            throw new VMError(`wait needs a non-negative number of seconds, got ${seconds.inspect()}`);
          }
          await this.hostWait(seconds.value);
          break;
        }
        case Op.Survey:
        case Op.Segment:
        case Op.Filter:
        case Op.Mark:
        case Op.Manage:
        case Op.Scan: {
          const action = actions.get(op);
          if (action !== undefined) {
            await this.performAction(action);
          }
          break;
        }

        default:
          this.onUnknownOpcode(op);
      }
    }
  }

  /**
   * Step over one instruction while fast-forwarding past an exhausted
   * loop. Stops after the Loop that jumps back to the Advance at
   * `skipping`.
   */
  private skipInstruction(frame: CallFrame, op: number): void {
    if (!isKnownOp(op) || operandCount(op) === 0) {
      return;
    }
    const operand = frame.read();
    if (op === Op.Loop && frame.ip.position - operand === this.skipping) {
      this.skipping = null;
    }
  }

  // ===========================================================================
  // Stack operations
  // ===========================================================================

  private push(value: VelaObject): void {
    this.stack.push(value);
  }

  private pop(): VelaObject {
    return this.stack.pop(this.frame.base);
  }

  private readName(frame: CallFrame): string {
    const constant = frame.readConstant();
    if (!(constant instanceof VelaString)) {
      throw new VMError(`expected a name constant, got ${constant.inspect()}`);
    }
    return constant.value;
  }

  private pushCallFrame(frame: CallFrame): void {
    if (this.frames.length >= MAX_FRAME_DEPTH) {
      throw new VMError("call stack overflow");
    }
    this.frames.push(frame);
  }

  // ===========================================================================
  // Operators
  // ===========================================================================

  private unary(name: string, apply: (value: VelaObject) => OpResult): void {
    const operand = this.pop();
    const result = apply(operand);
    if (result === DECLINED) {
      throw new VMError(`Unsupported operand for ${name}: '${operand.type}'`);
    }
    this.push(result);
  }

  private binary(op: number): void {
    const operator = binaryOperators.get(op);
    if (operator === undefined) {
      throw new VMError(`Unhandled opcode ${op}`);
    }
    const right = this.pop();
    const left = this.pop();
    let result = operator.apply(left, right);
    if (result === DECLINED) {
      result = operator.mirror(left, right);
    }
    if (result === DECLINED) {
      throw new VMError(
        `Unsupported operands for ${operator.name}: '${left.type}' and '${right.type}'`
      );
    }
    this.push(result);
  }

  private getField(name: string): void {
    const target = this.pop();
    if (!(target instanceof VelaEnum) && !(target instanceof VelaNativeEnum)) {
      throw new VMError("Can only read properties from enumerations");
    }
    const value = target.getField(name);
    if (value === undefined) {
      throw new VMError(`${target.inspect()} has no member '${name}'`);
    }
    this.push(value);
  }

  // ===========================================================================
  // Calls and generators
  // ===========================================================================

  /**
   * Pop the current frame. Returns true when the script frame finished.
   */
  private returnFromFrame(): boolean {
    const result = this.pop();
    const frame = this.frame;
    this.frames.pop();
    this.stack.truncate(frame.base);

    if (frame.driver !== null) {
      // A generator ran off its end: the driving loop is over.
      frame.driver.iterator.generator.finish();
      this.skipping = frame.driver.advanceAt;
      return false;
    }
    if (this.frames.length === 0) {
      return true;
    }
    this.push(result);
    return false;
  }

  /**
   * Suspend a generator frame, saving its window and position, and hand
   * the yielded value to the loop driving it.
   */
  private yieldFromFrame(): void {
    const frame = this.frame;
    if (frame.driver === null) {
      throw new VMError("Can only yield from a generator driven by foreach");
    }
    const result = this.pop();
    const slots = this.stack.slice(frame.base);
    this.stack.truncate(frame.base);
    this.frames.pop();
    frame.driver.iterator.generator.suspend({ slots, ip: frame.ip });
    this.push(result);
  }

  /**
   * Pull the next value from the iterator held in a local slot. On
   * exhaustion nothing is pushed and the rest of the loop is skipped.
   */
  private advance(frame: CallFrame): void {
    const advanceAt = frame.ip.position - 1;
    const slot = frame.slot(frame.read());
    let source = this.stack.get(slot);

    if (source instanceof VelaArray) {
      source = new VelaNativeIterator([...source.elements]);
      this.stack.set(slot, source);
    }

    if (source instanceof VelaNativeIterator) {
      const next = source.next();
      if (next === undefined) {
        this.skipping = advanceAt;
      } else {
        this.push(next);
      }
      return;
    }

    if (source instanceof VelaIterator) {
      const generator = source.generator;
      if (generator.isExhausted) {
        this.skipping = advanceAt;
        return;
      }
      const saved = generator.resume();
      const base = this.stack.top;
      this.stack.pushAll(saved.slots);
      this.pushCallFrame(
        new CallFrame(generator.fn, base, saved.ip ?? undefined, { iterator: source, advanceAt })
      );
      return;
    }

    throw new VMError("Can only iterate over iterables");
  }

  // ===========================================================================
  // Host
  // ===========================================================================

  private async performAction(action: DomainAction): Promise<void> {
    const handler = this.host[action];
    if (handler === undefined) {
      throw new VMError(`'${action}' is not bound to an instrument action`);
    }
    await handler.call(this.host);
  }

  private async hostWait(seconds: number): Promise<void> {
    const wait = this.host.wait;
    if (wait === undefined) {
      throw new VMError("'wait' is not bound to the host");
    }
    await wait.call(this.host, seconds);
  }

  private reportFailure(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    const trace = [...this.frames]
      .reverse()
      .map((frame) => `[line ${frame.line()} in ${frame.name}]`);
    this.lastError = { message, trace };
    this.errorOutput(`Runtime error: ${message}`);
    for (const entry of trace) {
      this.errorOutput(entry);
    }
  }
}
