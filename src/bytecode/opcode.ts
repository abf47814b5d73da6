/**
 * Vela bytecode opcode definitions.
 *
 * Each instruction is an opcode followed by at most one operand.
 */

/**
 * Bytecode opcodes for the Vela VM.
 */
export const enum Op {
  // =========================================================================
  // Literals (1-9)
  // =========================================================================
  Constant = 1, // Push constant
  True = 2, // Push true
  False = 3, // Push false
  Nil = 4, // Push void

  // =========================================================================
  // Operators (10-29)
  // =========================================================================
  Negate = 10, // Unary minus
  Invert = 11, // Logical not
  Power = 12, // a ^ b
  Add = 13, // a + b
  Sub = 14, // a - b
  Equal = 15, // a == b
  Less = 16, // a < b
  More = 17, // a > b
  Mix = 18, // a | b
  Print = 19, // Print top of stack without popping

  // =========================================================================
  // Variables (30-39)
  // =========================================================================
  DefineGlobal = 30, // Pop into a new global
  GetGlobal = 31, // Push global
  SetGlobal = 32, // Assign global, leaving the value
  GetLocal = 33, // Push local slot
  SetLocal = 34, // Assign local slot, leaving the value

  // =========================================================================
  // Control flow (40-49)
  // =========================================================================
  Loop = 40, // Jump backward
  JumpIfFalse = 41, // Jump forward if top is falsey (does not pop)
  Jump = 42, // Jump forward
  Advance = 43, // Pull the next value from the iterator in a local slot
  Pop = 44, // Discard top of stack

  // =========================================================================
  // Objects (50-59)
  // =========================================================================
  Enum = 50, // Push a new enumeration
  GetField = 51, // Replace enumeration with member value
  DefineField = 52, // Add a member to the enumeration on top
  BuildArray = 53, // Gather N values into an array

  // =========================================================================
  // Calls (60-69)
  // =========================================================================
  Return = 60, // Return from function
  Call = 61, // Call with N arguments
  Yield = 62, // Suspend generator, saving its frame

  // =========================================================================
  // Host interaction (70-79)
  // =========================================================================
  Wait = 70, // Suspend for N seconds
  Survey = 71,
  Segment = 72,
  Filter = 73,
  Mark = 74,
  Manage = 75,
  Scan = 76,
}

/**
 * How an instruction's operand is interpreted.
 */
export const enum OperandKind {
  None = "none",
  Constant = "constant",
  Byte = "byte",
  Jump = "jump",
  Loop = "loop",
}

const names: ReadonlyMap<number, string> = new Map([
  [Op.Constant, "Constant"],
  [Op.True, "True"],
  [Op.False, "False"],
  [Op.Nil, "Nil"],
  [Op.Negate, "Negate"],
  [Op.Invert, "Invert"],
  [Op.Power, "Power"],
  [Op.Add, "Add"],
  [Op.Sub, "Sub"],
  [Op.Equal, "Equal"],
  [Op.Less, "Less"],
  [Op.More, "More"],
  [Op.Mix, "Mix"],
  [Op.Print, "Print"],
  [Op.DefineGlobal, "DefineGlobal"],
  [Op.GetGlobal, "GetGlobal"],
  [Op.SetGlobal, "SetGlobal"],
  [Op.GetLocal, "GetLocal"],
  [Op.SetLocal, "SetLocal"],
  [Op.Loop, "Loop"],
  [Op.JumpIfFalse, "JumpIfFalse"],
  [Op.Jump, "Jump"],
  [Op.Advance, "Advance"],
  [Op.Pop, "Pop"],
  [Op.Enum, "Enum"],
  [Op.GetField, "GetField"],
  [Op.DefineField, "DefineField"],
  [Op.BuildArray, "BuildArray"],
  [Op.Return, "Return"],
  [Op.Call, "Call"],
  [Op.Yield, "Yield"],
  [Op.Wait, "Wait"],
  [Op.Survey, "Survey"],
  [Op.Segment, "Segment"],
  [Op.Filter, "Filter"],
  [Op.Mark, "Mark"],
  [Op.Manage, "Manage"],
  [Op.Scan, "Scan"],
]);

/**
 * Whether a numeric code belongs to the instruction set.
 */
export function isKnownOp(code: number): boolean {
  return names.has(code);
}

/**
 * Get the operand kind for an opcode.
 */
export function operandKind(op: Op): OperandKind {
  switch (op) {
    case Op.Constant:
    case Op.DefineGlobal:
    case Op.GetGlobal:
    case Op.SetGlobal:
    case Op.Enum:
    case Op.GetField:
    case Op.DefineField:
      return OperandKind.Constant;

    case Op.GetLocal:
    case Op.SetLocal:
    case Op.Call:
    case Op.BuildArray:
    case Op.Advance:
      return OperandKind.Byte;

    case Op.JumpIfFalse:
    case Op.Jump:
      return OperandKind.Jump;

    case Op.Loop:
      return OperandKind.Loop;

    default:
      return OperandKind.None;
  }
}

/**
 * Get the number of operands for an opcode.
 */
export function operandCount(op: Op): number {
  return operandKind(op) === OperandKind.None ? 0 : 1;
}

/**
 * Get the name of an opcode for debugging.
 */
export function opName(code: number): string {
  return names.get(code) ?? `Unknown(${code})`;
}
