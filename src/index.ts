/**
 * Vela - a scripting language for instrument automation.
 *
 * @packageDocumentation
 */

// Token exports
export {
  TokenKind,
  newToken,
  newPosition,
  lineNumber,
  columnNumber,
  formatPosition,
  lookupIdentifier,
  statementKeywords,
} from "./token/token.js";
export type { Token, Position, NumericLiteral, NumberBase } from "./token/token.js";

// Lexer exports
export { Lexer, tokenize } from "./lexer/lexer.js";

// Parser exports
export { Precedence, getPrecedence } from "./parser/precedence.js";

// Bytecode exports
export * from "./bytecode/index.js";

// Compiler exports
export * from "./compiler/index.js";

// Object exports
export * from "./object/index.js";

// VM exports
export * from "./vm/index.js";

// Builtins exports
export { createBuiltins } from "./builtins/builtins.js";

// Runner exports
export { runFile, runCode, createVM, createLoggingHost, VERSION } from "./runner.js";

// REPL export
export { startRepl } from "./repl.js";
