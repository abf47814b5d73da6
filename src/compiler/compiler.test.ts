import { describe, it, expect } from "vitest";
import { compile, CompileError } from "./compiler.js";
import { Op } from "../bytecode/opcode.js";
import { VelaFunction, VelaGenerator, VelaNumber, VelaString } from "../object/object.js";

function compileOk(source: string): VelaFunction {
  const { script, errors } = compile(source);
  expect(errors).toEqual([]);
  if (script === null) {
    throw new Error("compilation failed");
  }
  return script;
}

function errorMessages(source: string): string[] {
  return compile(source).errors.map((e) => e.message);
}

describe("Compiler", () => {
  describe("expressions", () => {
    it("should compile arithmetic", () => {
      const script = compileOk("1 + 2");
      expect(script.chunk.code).toEqual([
        Op.Constant, 0,
        Op.Constant, 1,
        Op.Add,
        Op.Pop,
        Op.Nil,
        Op.Return,
      ]);
      expect(script.chunk.constants.map((c) => c.inspect())).toEqual(["1", "2"]);
    });

    it("should share constants with equal values", () => {
      const script = compileOk("1 + 1");
      expect(script.chunk.constants).toHaveLength(1);
      expect(script.chunk.code.slice(0, 4)).toEqual([Op.Constant, 0, Op.Constant, 0]);
    });

    it("should compile derived comparisons with an invert", () => {
      expect(compileOk("a != b").chunk.code.slice(4, 6)).toEqual([Op.Equal, Op.Invert]);
      expect(compileOk("a <= b").chunk.code.slice(4, 6)).toEqual([Op.More, Op.Invert]);
      expect(compileOk("a >= b").chunk.code.slice(4, 6)).toEqual([Op.Less, Op.Invert]);
    });

    it("should bind exponent tighter than addition", () => {
      const script = compileOk("1 + 2 ^ 3");
      expect(script.chunk.code.slice(0, 8)).toEqual([
        Op.Constant, 0,
        Op.Constant, 1,
        Op.Constant, 2,
        Op.Power,
        Op.Add,
      ]);
    });

    it("should compile print as a postfix operator", () => {
      const script = compileOk("x?");
      expect(script.chunk.code).toEqual([Op.GetGlobal, 0, Op.Print, Op.Pop, Op.Nil, Op.Return]);
    });

    it("should compile array literals", () => {
      const script = compileOk("[1, 2, 3]");
      expect(script.chunk.code.slice(6, 8)).toEqual([Op.BuildArray, 3]);
    });

    it("should compile property access", () => {
      const script = compileOk("Color.Red");
      expect(script.chunk.code.slice(0, 4)).toEqual([Op.GetGlobal, 0, Op.GetField, 1]);
      expect(script.chunk.constants[1]).toBeInstanceOf(VelaString);
    });

    it("should compile calls", () => {
      const script = compileOk("f(1, 2)");
      expect(script.chunk.code.slice(0, 8)).toEqual([
        Op.GetGlobal, 0,
        Op.Constant, 1,
        Op.Constant, 2,
        Op.Call, 2,
      ]);
    });
  });

  describe("variables", () => {
    it("should define globals", () => {
      const script = compileOk("var x = 1");
      expect(script.chunk.code).toEqual([Op.Constant, 1, Op.DefineGlobal, 0, Op.Nil, Op.Return]);
      expect(script.chunk.constants.map((c) => c.inspect())).toEqual(['"x"', "1"]);
    });

    it("should default a declaration to void", () => {
      const script = compileOk("var x");
      expect(script.chunk.code.slice(0, 3)).toEqual([Op.Nil, Op.DefineGlobal, 0]);
    });

    it("should compile global assignment", () => {
      const script = compileOk("x = 2");
      expect(script.chunk.code).toEqual([Op.Constant, 1, Op.SetGlobal, 0, Op.Pop, Op.Nil, Op.Return]);
    });

    it("should allow shadowing in a nested block", () => {
      const { errors } = compile("for (var i = 0, i < 1, i = i + 1) {\n  var i = 5\n}");
      expect(errors).toEqual([]);
    });
  });

  describe("control flow", () => {
    it("should patch jumps in a for loop", () => {
      const script = compileOk("for (var i = 0, i < 3, i = i + 1) { i? }");
      const code = script.chunk.code;
      expect(code).toEqual([
        Op.Constant, 0,
        Op.GetLocal, 1,
        Op.Constant, 1,
        Op.Less,
        Op.JumpIfFalse, 19,
        Op.Pop,
        Op.Jump, 10,
        Op.GetLocal, 1,
        Op.Constant, 2,
        Op.Add,
        Op.SetLocal, 1,
        Op.Pop,
        Op.Loop, 20,
        Op.GetLocal, 1,
        Op.Print,
        Op.Pop,
        Op.Loop, 16,
        Op.Pop,
        Op.Pop,
        Op.Nil,
        Op.Return,
      ]);
    });

    it("should compile foreach around an Advance", () => {
      const script = compileOk("foreach (var x = xs) { x? }");
      expect(script.chunk.code).toEqual([
        Op.GetGlobal, 0,
        Op.Nil,
        Op.Advance, 1,
        Op.SetLocal, 2,
        Op.Pop,
        Op.GetLocal, 2,
        Op.Print,
        Op.Pop,
        Op.Loop, 11,
        Op.Pop,
        Op.Pop,
        Op.Nil,
        Op.Return,
      ]);
    });
  });

  describe("functions", () => {
    it("should compile a function into a constant", () => {
      const script = compileOk("func add(a, b) {\n  return a + b\n}");
      const fn = script.chunk.constants[1];
      expect(fn).toBeInstanceOf(VelaFunction);
      if (!(fn instanceof VelaFunction)) return;
      expect(fn.arity).toBe(2);
      expect(fn.chunk.code).toEqual([
        Op.GetLocal, 1,
        Op.GetLocal, 2,
        Op.Add,
        Op.Return,
        Op.Nil,
        Op.Return,
      ]);
    });

    it("should compile return in a generator as yield", () => {
      const script = compileOk("iter g() { return 1 }");
      expect(script.chunk.code).toEqual([Op.Constant, 1, Op.DefineGlobal, 0, Op.Nil, Op.Return]);
      const gen = script.chunk.constants[1];
      expect(gen).toBeInstanceOf(VelaGenerator);
      if (!(gen instanceof VelaGenerator)) return;
      expect(gen.fn.chunk.code).toEqual([Op.Constant, 0, Op.Yield, Op.Nil, Op.Return]);
      expect(gen.fn.chunk.constants[0]).toEqual(new VelaNumber(1));
    });

    it("should reject nested functions", () => {
      const { errors } = compile("func outer() {\n  func inner() {\n  }\n}");
      expect(errors.map((e) => e.reason)).toEqual(["Function nesting is not supported"]);
    });

    it("should reject return at script level", () => {
      expect(errorMessages("return 1")).toEqual(["Can only return from inside functions at 1:1"]);
    });
  });

  describe("statements", () => {
    it("should compile enumerations", () => {
      const script = compileOk("namespace Color { Red, Green }");
      expect(script.chunk.code).toEqual([
        Op.Enum, 0,
        Op.DefineGlobal, 0,
        Op.GetGlobal, 0,
        Op.DefineField, 1,
        Op.DefineField, 2,
        Op.Pop,
        Op.Nil,
        Op.Return,
      ]);
    });

    it("should compile instrument actions and wait", () => {
      const script = compileOk("Scan\nwait 2\nSearch");
      expect(script.chunk.code).toEqual([
        Op.Survey,
        Op.Constant, 0,
        Op.Wait,
        Op.Scan,
        Op.Nil,
        Op.Return,
      ]);
    });

    it("should record source lines", () => {
      const script = compileOk("1\n2");
      expect(script.chunk.lines).toEqual([1, 1, 1, 2, 2, 2, 2, 2]);
    });
  });

  describe("errors", () => {
    it("should report a missing expression at end of input", () => {
      const { script, errors } = compile("var x = ");
      expect(script).toBeNull();
      expect(errors.map((e) => e.message)).toEqual(["Expected expression at end"]);
      expect(errors[0]).toBeInstanceOf(CompileError);
      expect(errors[0].line).toBeNull();
    });

    it("should recover at statement boundaries", () => {
      expect(errorMessages("var = 1\nvar y = )\nvar z = 3")).toEqual([
        "Expected variable name at 1:5",
        "Unknown expression ')' at 2:9",
      ]);
    });

    it("should resume after the closing brace of a one-line block", () => {
      expect(errorMessages("func f() { var = 1 }\nf()")).toEqual(["Expected variable name at 1:16"]);
    });

    it("should report a stray closing brace once", () => {
      expect(errorMessages("}\nvar x = 1")).toEqual(["Unknown expression '}' at 1:1"]);
    });

    it("should carry the line and column", () => {
      const [err] = compile("1 2").errors;
      expect(err.reason).toBe("Expected a newline between statements");
      expect(err.line).toBe(1);
      expect(err.column).toBe(3);
    });

    it("should reject invalid assignment targets", () => {
      expect(errorMessages("a + b = c")).toEqual(["Invalid assignment target at 1:7"]);
    });

    it("should reject duplicate locals in one block", () => {
      const source = "for (var i = 0, i < 1, i = i + 1) {\n  var a = 1\n  var a = 2\n}";
      expect(errorMessages(source)).toEqual(["Already a variable called 'a' in this scope at 3:7"]);
    });

    it("should reject reading a local in its own initializer", () => {
      const source = "for (var i = 0, i < 1, i = i + 1) {\n  var a = a\n}";
      expect(compile(source).errors.map((e) => e.reason)).toEqual([
        "Cannot read local variable in its own initializer",
      ]);
    });

    it("should report lexer errors", () => {
      expect(compile('"abc').errors.map((e) => e.reason)).toEqual(["Unterminated string"]);
    });

    it("should report an unclosed block", () => {
      expect(errorMessages("func f() {\n  1")).toEqual(["Expected '}' after block at end"]);
    });
  });
});
