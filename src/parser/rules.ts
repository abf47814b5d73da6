/**
 * Prefix, infix and statement rules. Each rule consumes tokens through
 * the compiler and emits bytecode as it goes.
 */

import { TokenKind } from "../token/token.js";
import { Op } from "../bytecode/opcode.js";
import { Precedence, getPrecedence } from "./precedence.js";
import type { Compiler } from "../compiler/compiler.js";
import { FunctionKind } from "../compiler/scope.js";
import {
  ObjectType,
  VelaGenerator,
  VelaNumber,
  VelaPath,
  VelaString,
  VelaTag,
} from "../object/object.js";

/** Maximum call arguments and array literal elements. */
const MAX_ARGUMENTS = 255;

/** Name of the hidden local holding a foreach loop's iterator. */
const ITERATOR_SLOT_NAME = " iterator";

export type PrefixRule = (c: Compiler, canAssign: boolean) => void;
export type InfixRule = (c: Compiler) => void;
export type StatementRule = (c: Compiler) => void;

// =============================================================================
// Prefix rules
// =============================================================================

export function numberLiteral(c: Compiler): void {
  const value = c.previous.numeric?.value ?? 0;
  c.emitConstant(new VelaNumber(value), `n:${value}`);
}

export function stringLiteral(c: Compiler): void {
  const text = c.previous.literal;
  c.emitConstant(new VelaString(text), `s:${text}`);
}

export function pathLiteral(c: Compiler): void {
  const text = c.previous.literal;
  c.emitConstant(new VelaPath(text), `p:${text}`);
}

export function literal(c: Compiler): void {
  switch (c.previous.kind) {
    case TokenKind.TRUE:
      c.emit(Op.True);
      break;
    case TokenKind.FALSE:
      c.emit(Op.False);
      break;
    default:
      c.emit(Op.Nil);
  }
}

export function tagLiteral(c: Compiler): void {
  const kind = c.previous.kind;
  const name = c.previous.lexeme;
  const type =
    kind === TokenKind.DRIFT || kind === TokenKind.EMISSION || kind === TokenKind.FOCUS
      ? ObjectType.Correction
      : ObjectType.Algorithm;
  c.emitConstant(new VelaTag(type, name), `${type}:${name}`);
}

export function variable(c: Compiler, canAssign: boolean): void {
  c.namedVariable(c.previous.lexeme, canAssign);
}

export function unary(c: Compiler): void {
  const kind = c.previous.kind;
  c.parsePrecedence(Precedence.PREFIX);
  c.emit(kind === TokenKind.MINUS ? Op.Negate : Op.Invert);
}

export function grouping(c: Compiler): void {
  c.expression();
  c.consume(TokenKind.RPAREN, "Expected ')' after expression");
}

export function arrayLiteral(c: Compiler): void {
  const count = expressionList(c, TokenKind.RBRACKET, "Expected ']' after array elements");
  c.emitOp(Op.BuildArray, count);
}

// =============================================================================
// Infix rules
// =============================================================================

export function binary(c: Compiler): void {
  const kind = c.previous.kind;
  c.parsePrecedence(getPrecedence(kind));

  switch (kind) {
    case TokenKind.CARET:
      c.emit(Op.Power);
      break;
    case TokenKind.PLUS:
      c.emit(Op.Add);
      break;
    case TokenKind.MINUS:
      c.emit(Op.Sub);
      break;
    case TokenKind.PIPE:
      c.emit(Op.Mix);
      break;
    case TokenKind.EQ:
      c.emit(Op.Equal);
      break;
    case TokenKind.NOT_EQ:
      c.emit(Op.Equal);
      c.emit(Op.Invert);
      break;
    case TokenKind.LT:
      c.emit(Op.Less);
      break;
    case TokenKind.GT:
      c.emit(Op.More);
      break;
    case TokenKind.LT_EQUALS:
      c.emit(Op.More);
      c.emit(Op.Invert);
      break;
    case TokenKind.GT_EQUALS:
      c.emit(Op.Less);
      c.emit(Op.Invert);
      break;
  }
}

/** Postfix `?`: print the value and leave it on the stack. */
export function print(c: Compiler): void {
  c.emit(Op.Print);
}

export function call(c: Compiler): void {
  const count = expressionList(c, TokenKind.RPAREN, "Expected ')' after arguments");
  c.emitOp(Op.Call, count);
}

export function property(c: Compiler): void {
  c.consume(TokenKind.IDENT, "Expected property name after '.'");
  c.emitOp(Op.GetField, c.identifierConstant(c.previous.lexeme));
}

function expressionList(c: Compiler, closing: TokenKind, message: string): number {
  let count = 0;
  if (!c.check(closing)) {
    do {
      c.expression();
      if (count === MAX_ARGUMENTS) {
        c.error(`Can't have more than ${MAX_ARGUMENTS} arguments`);
      }
      count++;
    } while (c.match(TokenKind.COMMA));
  }
  c.consume(closing, message);
  return count;
}

// =============================================================================
// Statement rules
// =============================================================================

export function varDeclaration(c: Compiler): void {
  const global = c.parseVariable("Expected variable name");
  if (c.match(TokenKind.ASSIGN)) {
    c.expression();
  } else {
    c.emit(Op.Nil);
  }
  c.defineVariable(global);
}

export function funcDeclaration(c: Compiler): void {
  declareCallable(c, FunctionKind.Function);
}

export function iterDeclaration(c: Compiler): void {
  declareCallable(c, FunctionKind.Generator);
}

function declareCallable(c: Compiler, kind: FunctionKind): void {
  if (c.scope.kind !== FunctionKind.Script) {
    c.error(
      kind === FunctionKind.Generator
        ? "Generator nesting is not supported"
        : "Function nesting is not supported"
    );
  }
  const global = c.parseVariable(
    kind === FunctionKind.Generator ? "Expected generator name" : "Expected function name"
  );
  const name = c.previous.lexeme;
  // The name is usable inside its own body.
  c.scope.markInitialized();

  const fn = c.compileFunction(kind, name);
  if (kind === FunctionKind.Generator) {
    c.emitConstant(new VelaGenerator(fn));
  } else {
    c.emitConstant(fn);
  }
  c.defineVariable(global);
}

/**
 * `for (init, condition, increment) { body }`. The increment is compiled
 * before the body and jumped over on the first pass.
 */
export function forStatement(c: Compiler): void {
  c.beginScope();
  c.consume(TokenKind.LPAREN, "Expected '(' after 'for'");

  if (c.match(TokenKind.VAR)) {
    varDeclaration(c);
  } else if (!c.check(TokenKind.COMMA)) {
    c.expression();
    c.emit(Op.Pop);
  }
  c.consume(TokenKind.COMMA, "Expected ',' after loop initializer");

  let loopStart = c.chunk.length;
  c.expression();
  c.consume(TokenKind.COMMA, "Expected ',' after loop condition");
  const exitJump = c.emitJump(Op.JumpIfFalse);
  c.emit(Op.Pop);

  if (!c.check(TokenKind.RPAREN)) {
    const bodyJump = c.emitJump(Op.Jump);
    const incrementStart = c.chunk.length;
    c.expression();
    c.emit(Op.Pop);
    c.emitLoop(loopStart);
    loopStart = incrementStart;
    c.patchJump(bodyJump);
  }
  c.consume(TokenKind.RPAREN, "Expected ')' after for clauses");

  loopBody(c);
  c.emitLoop(loopStart);

  c.patchJump(exitJump);
  c.emit(Op.Pop);
  c.endScope();
}

/**
 * `foreach (var x = iterable) { body }`. The iterable sits in a hidden
 * local; each pass Advance pulls the next value or leaves the loop.
 */
export function foreachStatement(c: Compiler): void {
  c.beginScope();
  c.consume(TokenKind.LPAREN, "Expected '(' after 'foreach'");
  c.consume(TokenKind.VAR, "Expected 'var' in foreach");
  c.consume(TokenKind.IDENT, "Expected loop variable name");
  const name = c.previous.lexeme;
  c.consume(TokenKind.ASSIGN, "Expected '=' after loop variable");

  c.expression();
  const iteratorSlot = c.declareLocal(ITERATOR_SLOT_NAME);
  c.scope.markInitialized();
  c.emit(Op.Nil);
  const valueSlot = c.declareLocal(name);
  c.scope.markInitialized();
  c.consume(TokenKind.RPAREN, "Expected ')' after foreach clause");

  const loopStart = c.chunk.length;
  c.emitOp(Op.Advance, iteratorSlot);
  c.emitOp(Op.SetLocal, valueSlot);
  c.emit(Op.Pop);

  loopBody(c);
  c.emitLoop(loopStart);
  c.endScope();
}

function loopBody(c: Compiler): void {
  c.consume(TokenKind.LBRACE, "Expected '{' before loop body");
  c.beginScope();
  c.block();
  c.endScope();
}

/**
 * `return [value]`. Inside a generator this yields the value instead.
 */
export function returnStatement(c: Compiler): void {
  if (c.scope.kind === FunctionKind.Script) {
    c.error("Can only return from inside functions");
  }
  if (c.atStatementEnd()) {
    c.emit(Op.Nil);
  } else {
    c.expression();
  }
  c.emit(c.scope.kind === FunctionKind.Generator ? Op.Yield : Op.Return);
}

export function waitStatement(c: Compiler): void {
  c.expression();
  c.emit(Op.Wait);
}

export function actionStatement(op: Op): StatementRule {
  return (c) => {
    c.emit(op);
  };
}

/**
 * `namespace Name { A, B, C }`. Members are numbered in declaration order.
 */
export function namespaceDeclaration(c: Compiler): void {
  if (c.scope.kind !== FunctionKind.Script) {
    c.error("Enumeration nesting is not supported");
  }
  const global = c.parseVariable("Expected enumeration name");
  const name = c.previous.lexeme;
  c.emitOp(Op.Enum, c.identifierConstant(name));
  c.defineVariable(global);
  c.namedVariable(name, false);

  c.consume(TokenKind.LBRACE, "Expected '{' before enumeration members");
  c.skipNewlines();
  if (!c.check(TokenKind.RBRACE)) {
    do {
      c.skipNewlines();
      c.consume(TokenKind.IDENT, "Expected member name");
      c.emitOp(Op.DefineField, c.identifierConstant(c.previous.lexeme));
      c.skipNewlines();
    } while (c.match(TokenKind.COMMA));
  }
  c.consume(TokenKind.RBRACE, "Expected '}' after enumeration members");
  c.emit(Op.Pop);
}
