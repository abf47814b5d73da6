/**
 * Single-pass compiler: parses tokens with a Pratt rule table and emits
 * bytecode directly, without building a tree.
 */

import {
  Token,
  TokenKind,
  Position,
  formatPosition,
  lineNumber,
  columnNumber,
  statementKeywords,
} from "../token/token.js";
import { tokenize } from "../lexer/lexer.js";
import { Op } from "../bytecode/opcode.js";
import type { Chunk } from "../bytecode/chunk.js";
import { Precedence, getPrecedence } from "../parser/precedence.js";
import {
  PrefixRule,
  InfixRule,
  StatementRule,
  numberLiteral,
  stringLiteral,
  pathLiteral,
  literal,
  tagLiteral,
  variable,
  unary,
  grouping,
  arrayLiteral,
  binary,
  print,
  call,
  property,
  varDeclaration,
  funcDeclaration,
  iterDeclaration,
  forStatement,
  foreachStatement,
  returnStatement,
  waitStatement,
  actionStatement,
  namespaceDeclaration,
} from "../parser/rules.js";
import { FunctionScope, FunctionKind, MAX_LOCALS } from "./scope.js";
import { VelaString } from "../object/object.js";
import type { VelaFunction, VelaObject } from "../object/object.js";

/** Placeholder operand for forward jumps awaiting a patch. */
const PLACEHOLDER = 0xffff;

/** Largest operand an instruction word may carry. */
const MAX_OPERAND = 0xffff;

/**
 * Compiler error, positioned at the offending token.
 */
export class CompileError extends Error {
  /** The message without its location. */
  readonly reason: string;
  /** 1-indexed line, or null at end of input. */
  readonly line: number | null;
  /** 1-indexed column, or null at end of input. */
  readonly column: number | null;

  constructor(reason: string, position: Position | null) {
    super(`${reason} at ${position === null ? "end" : formatPosition(position)}`);
    this.name = "CompileError";
    this.reason = reason;
    this.line = position === null ? null : lineNumber(position);
    this.column = position === null ? null : columnNumber(position);
  }
}

/**
 * Vela compiler.
 */
export class Compiler {
  private readonly tokens: Token[];
  private index: number = 0;
  private errors: CompileError[] = [];
  private panicMode: boolean = false;
  /** Number of brace blocks currently open. */
  private blockDepth: number = 0;

  /** Token being looked at. */
  current: Token;
  /** Token most recently consumed. */
  previous: Token;
  /** Innermost function being compiled. */
  scope: FunctionScope;

  private prefixRules: Map<TokenKind, PrefixRule> = new Map();
  private infixRules: Map<TokenKind, InfixRule> = new Map();
  private statementRules: Map<TokenKind, StatementRule> = new Map();

  constructor(tokens: Token[]) {
    if (tokens.length === 0) {
      throw new Error("token stream must end with EOF");
    }
    this.tokens = tokens;
    const first = tokens[0];
    this.current = first;
    this.previous = first;
    this.scope = new FunctionScope(FunctionKind.Script, "", null);

    // Literals
    this.registerPrefix(TokenKind.NUMBER, numberLiteral);
    this.registerPrefix(TokenKind.HEX, numberLiteral);
    this.registerPrefix(TokenKind.BIN, numberLiteral);
    this.registerPrefix(TokenKind.STRING, stringLiteral);
    this.registerPrefix(TokenKind.PATH, pathLiteral);
    this.registerPrefix(TokenKind.TRUE, literal);
    this.registerPrefix(TokenKind.FALSE, literal);
    this.registerPrefix(TokenKind.VOID, literal);
    this.registerPrefix(TokenKind.DRIFT, tagLiteral);
    this.registerPrefix(TokenKind.EMISSION, tagLiteral);
    this.registerPrefix(TokenKind.FOCUS, tagLiteral);
    this.registerPrefix(TokenKind.MANHATTAN, tagLiteral);
    this.registerPrefix(TokenKind.EUCLIDEAN, tagLiteral);
    this.registerPrefix(TokenKind.MINKOWSKI, tagLiteral);

    // Other prefix expressions
    this.registerPrefix(TokenKind.IDENT, variable);
    this.registerPrefix(TokenKind.MINUS, unary);
    this.registerPrefix(TokenKind.BANG, unary);
    this.registerPrefix(TokenKind.LPAREN, grouping);
    this.registerPrefix(TokenKind.LBRACKET, arrayLiteral);

    // Infix expressions
    this.registerInfix(TokenKind.CARET, binary);
    this.registerInfix(TokenKind.PLUS, binary);
    this.registerInfix(TokenKind.MINUS, binary);
    this.registerInfix(TokenKind.PIPE, binary);
    this.registerInfix(TokenKind.EQ, binary);
    this.registerInfix(TokenKind.NOT_EQ, binary);
    this.registerInfix(TokenKind.LT, binary);
    this.registerInfix(TokenKind.GT, binary);
    this.registerInfix(TokenKind.LT_EQUALS, binary);
    this.registerInfix(TokenKind.GT_EQUALS, binary);
    this.registerInfix(TokenKind.QUESTION, print);
    this.registerInfix(TokenKind.LPAREN, call);
    this.registerInfix(TokenKind.DOT, property);

    // Statements
    this.registerStatement(TokenKind.VAR, varDeclaration);
    this.registerStatement(TokenKind.FUNC, funcDeclaration);
    this.registerStatement(TokenKind.ITER, iterDeclaration);
    this.registerStatement(TokenKind.FOR, forStatement);
    this.registerStatement(TokenKind.FOREACH, foreachStatement);
    this.registerStatement(TokenKind.RETURN, returnStatement);
    this.registerStatement(TokenKind.WAIT, waitStatement);
    this.registerStatement(TokenKind.NAMESPACE, namespaceDeclaration);
    this.registerStatement(TokenKind.SURVEY, actionStatement(Op.Survey));
    this.registerStatement(TokenKind.SEGMENT, actionStatement(Op.Segment));
    this.registerStatement(TokenKind.FILTER, actionStatement(Op.Filter));
    this.registerStatement(TokenKind.MARK, actionStatement(Op.Mark));
    this.registerStatement(TokenKind.MANAGE, actionStatement(Op.Manage));
    this.registerStatement(TokenKind.SCAN, actionStatement(Op.Scan));
  }

  private registerPrefix(kind: TokenKind, rule: PrefixRule): void {
    this.prefixRules.set(kind, rule);
  }

  private registerInfix(kind: TokenKind, rule: InfixRule): void {
    this.infixRules.set(kind, rule);
  }

  private registerStatement(kind: TokenKind, rule: StatementRule): void {
    this.statementRules.set(kind, rule);
  }

  /**
   * Compile the whole token stream into the top-level script function.
   * Returns null when any error was reported.
   */
  compile(): VelaFunction | null {
    this.advance();
    while (!this.check(TokenKind.EOF)) {
      if (this.match(TokenKind.EOL)) {
        continue;
      }
      this.declaration();
    }
    this.emitReturn();
    return this.errors.length > 0 ? null : this.scope.fn;
  }

  /**
   * Get all compilation errors, in source order.
   */
  getErrors(): CompileError[] {
    return this.errors;
  }

  // ===========================================================================
  // Token stream
  // ===========================================================================

  advance(): void {
    this.previous = this.current;
    for (;;) {
      const next = this.tokens[this.index];
      if (next === undefined) {
        return;
      }
      if (this.index < this.tokens.length - 1) {
        this.index++;
      }
      this.current = next;
      if (next.kind !== TokenKind.ERROR) {
        return;
      }
      this.errorAtCurrent(next.literal);
    }
  }

  check(kind: TokenKind): boolean {
    return this.current.kind === kind;
  }

  match(kind: TokenKind): boolean {
    if (!this.check(kind)) {
      return false;
    }
    this.advance();
    return true;
  }

  consume(kind: TokenKind, message: string): boolean {
    if (this.check(kind)) {
      this.advance();
      return true;
    }
    this.errorAtCurrent(message);
    return false;
  }

  /** Skip blank lines. */
  skipNewlines(): void {
    while (this.match(TokenKind.EOL)) {
      // Skip
    }
  }

  /** Whether the current token ends a statement. */
  atStatementEnd(): boolean {
    return (
      this.check(TokenKind.EOL) || this.check(TokenKind.RBRACE) || this.check(TokenKind.EOF)
    );
  }

  // ===========================================================================
  // Statements and expressions
  // ===========================================================================

  private declaration(): void {
    const rule = this.statementRules.get(this.current.kind);
    if (rule !== undefined) {
      this.advance();
      rule(this);
    } else {
      this.expression();
      this.emit(Op.Pop);
    }

    if (!this.panicMode) {
      this.endStatement();
    }
    if (this.panicMode) {
      this.synchronize();
    }
  }

  private endStatement(): void {
    if (this.match(TokenKind.EOL)) {
      return;
    }
    if (this.check(TokenKind.RBRACE) || this.check(TokenKind.EOF)) {
      return;
    }
    this.errorAtCurrent("Expected a newline between statements");
  }

  /**
   * Skip tokens until a statement boundary. Inside a block the closing
   * brace is a boundary too; it is left for the block to consume.
   */
  private synchronize(): void {
    this.panicMode = false;
    while (!this.check(TokenKind.EOF)) {
      if (this.previous.kind === TokenKind.EOL) {
        return;
      }
      if (statementKeywords.has(this.current.kind)) {
        return;
      }
      if (this.blockDepth > 0 && this.check(TokenKind.RBRACE)) {
        return;
      }
      this.advance();
    }
  }

  /**
   * Compile declarations up to the closing brace. The opening brace has
   * already been consumed.
   */
  block(): void {
    this.blockDepth++;
    while (!this.check(TokenKind.RBRACE) && !this.check(TokenKind.EOF)) {
      if (this.match(TokenKind.EOL)) {
        continue;
      }
      this.declaration();
    }
    this.blockDepth--;
    this.consume(TokenKind.RBRACE, "Expected '}' after block");
  }

  expression(): void {
    this.parsePrecedence(Precedence.DECLARATION);
  }

  /**
   * Parse an expression whose operators all bind tighter than `precedence`.
   */
  parsePrecedence(precedence: Precedence): void {
    const token = this.current;
    if (token.kind === TokenKind.EOL || token.kind === TokenKind.EOF) {
      this.errorAtCurrent("Expected expression");
      return;
    }
    const prefix = this.prefixRules.get(token.kind);
    if (prefix === undefined) {
      this.errorAtCurrent(`Unknown expression '${token.lexeme}'`);
      return;
    }
    this.advance();

    const canAssign = precedence <= Precedence.ASSIGN;
    prefix(this, canAssign);

    while (precedence < getPrecedence(this.current.kind)) {
      const infix = this.infixRules.get(this.current.kind);
      if (infix === undefined) {
        break;
      }
      this.advance();
      infix(this);
    }

    if (canAssign && this.match(TokenKind.ASSIGN)) {
      this.error("Invalid assignment target");
    }
  }

  // ===========================================================================
  // Variables
  // ===========================================================================

  /**
   * Consume a variable name and declare it. Returns the name's constant
   * index for globals, or 0 for locals.
   */
  parseVariable(message: string): number {
    if (!this.consume(TokenKind.IDENT, message)) {
      return 0;
    }
    const name = this.previous.lexeme;
    if (this.scope.scopeDepth > 0) {
      this.declareLocal(name);
      return 0;
    }
    return this.identifierConstant(name);
  }

  /**
   * Declare a local in the innermost block and return its slot.
   */
  declareLocal(name: string): number {
    if (this.scope.isDeclaredInCurrentBlock(name)) {
      this.error(`Already a variable called '${name}' in this scope`);
    }
    if (this.scope.localCount >= MAX_LOCALS) {
      this.error("Too many local variables in function");
      return 0;
    }
    return this.scope.addLocal(name);
  }

  /**
   * Make a declared variable usable: marks a local initialized, or emits
   * the global definition.
   */
  defineVariable(global: number): void {
    if (this.scope.scopeDepth > 0) {
      this.scope.markInitialized();
      return;
    }
    this.emitOp(Op.DefineGlobal, global);
  }

  /**
   * Emit a read of a variable, or an assignment when allowed and an `=`
   * follows.
   */
  namedVariable(name: string, canAssign: boolean): void {
    let getOp: Op;
    let setOp: Op;
    let arg: number;

    const local = this.scope.resolveLocal(name);
    if (local !== undefined) {
      if (!local.initialized) {
        this.error("Cannot read local variable in its own initializer");
      }
      getOp = Op.GetLocal;
      setOp = Op.SetLocal;
      arg = local.slot;
    } else {
      getOp = Op.GetGlobal;
      setOp = Op.SetGlobal;
      arg = this.identifierConstant(name);
    }

    if (canAssign && this.match(TokenKind.ASSIGN)) {
      this.expression();
      this.emitOp(setOp, arg);
    } else {
      this.emitOp(getOp, arg);
    }
  }

  identifierConstant(name: string): number {
    return this.makeConstant(new VelaString(name), `s:${name}`);
  }

  beginScope(): void {
    this.scope.beginScope();
  }

  endScope(): void {
    const removed = this.scope.endScope();
    for (let i = 0; i < removed; i++) {
      this.emit(Op.Pop);
    }
  }

  /**
   * Compile a parameter list and body as a new function. The caller has
   * consumed the function's name.
   */
  compileFunction(kind: FunctionKind, name: string): VelaFunction {
    const scope = new FunctionScope(kind, name, this.scope);
    this.scope = scope;
    scope.beginScope();

    this.consume(TokenKind.LPAREN, "Expected '(' after function name");
    if (!this.check(TokenKind.RPAREN)) {
      do {
        scope.fn.arity++;
        if (scope.fn.arity > 255) {
          this.errorAtCurrent("Can't have more than 255 parameters");
        }
        this.parseVariable("Expected parameter name");
        this.defineVariable(0);
      } while (this.match(TokenKind.COMMA));
    }
    this.consume(TokenKind.RPAREN, "Expected ')' after parameters");
    this.consume(TokenKind.LBRACE, "Expected '{' before function body");
    this.block();
    this.emitReturn();

    this.scope = scope.enclosing ?? scope;
    return scope.fn;
  }

  // ===========================================================================
  // Emission
  // ===========================================================================

  get chunk(): Chunk {
    return this.scope.chunk;
  }

  emit(word: number): number {
    return this.chunk.write(word, lineNumber(this.previous.start));
  }

  emitOp(op: Op, operand: number): void {
    this.emit(op);
    this.emit(operand);
  }

  /** Implicit end of a body: return void. */
  emitReturn(): void {
    this.emit(Op.Nil);
    this.emit(Op.Return);
  }

  makeConstant(value: VelaObject, key?: string): number {
    const index = this.chunk.addConstant(value, key);
    if (index > MAX_OPERAND) {
      this.error("Too many constants in one chunk");
      return 0;
    }
    return index;
  }

  emitConstant(value: VelaObject, key?: string): void {
    this.emitOp(Op.Constant, this.makeConstant(value, key));
  }

  /**
   * Emit a forward jump with a placeholder and return the operand's offset.
   */
  emitJump(op: Op): number {
    this.emit(op);
    return this.emit(PLACEHOLDER);
  }

  /**
   * Point a forward jump at the next instruction to be emitted.
   */
  patchJump(operandOffset: number): void {
    const jump = this.chunk.length - operandOffset - 1;
    if (jump > MAX_OPERAND) {
      this.error("Too much code to jump over");
    }
    this.chunk.patch(operandOffset, jump);
  }

  /**
   * Emit a backward jump to `loopStart`. The operand is the distance
   * subtracted from the position after it.
   */
  emitLoop(loopStart: number): void {
    this.emit(Op.Loop);
    const offset = this.chunk.length - loopStart + 1;
    if (offset > MAX_OPERAND) {
      this.error("Loop body too large");
    }
    this.emit(offset);
  }

  // ===========================================================================
  // Errors
  // ===========================================================================

  /** Report an error at the token just consumed. */
  error(message: string): void {
    this.errorAt(this.previous, message);
  }

  /** Report an error at the token being looked at. */
  errorAtCurrent(message: string): void {
    this.errorAt(this.current, message);
  }

  private errorAt(token: Token, message: string): void {
    if (this.panicMode) {
      return;
    }
    this.panicMode = true;
    this.errors.push(
      new CompileError(message, token.kind === TokenKind.EOF ? null : token.start)
    );
  }
}

/**
 * Result of compiling source text.
 */
export interface CompileResult {
  /** Top-level script, or null when compilation failed. */
  script: VelaFunction | null;
  errors: CompileError[];
}

/**
 * Lex and compile source text.
 */
export function compile(source: string): CompileResult {
  const compiler = new Compiler(tokenize(source));
  const script = compiler.compile();
  return { script, errors: compiler.getErrors() };
}
