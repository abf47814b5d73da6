/**
 * Token types and position tracking for the Vela lexer.
 */

/**
 * Token kinds. Symbol kinds use their source text as value.
 */
export const enum TokenKind {
  // Special
  ERROR = "ERROR",
  EOF = "EOF",
  EOL = "EOL",

  // Literals
  IDENT = "IDENT",
  NUMBER = "NUMBER",
  HEX = "HEX",
  BIN = "BIN",
  STRING = "STRING",
  PATH = "PATH",

  // Punctuation
  COMMA = ",",
  DOT = ".",
  LPAREN = "(",
  RPAREN = ")",
  LBRACKET = "[",
  RBRACKET = "]",
  LBRACE = "{",
  RBRACE = "}",

  // Operators
  ASSIGN = "=",
  QUESTION = "?",
  MINUS = "-",
  BANG = "!",
  CARET = "^",
  PLUS = "+",
  PIPE = "|",
  EQ = "==",
  NOT_EQ = "!=",
  LT = "<",
  GT = ">",
  LT_EQUALS = "<=",
  GT_EQUALS = ">=",

  // Literal keywords
  TRUE = "true",
  FALSE = "false",
  VOID = "void",
  DRIFT = "drift",
  EMISSION = "emission",
  FOCUS = "focus",
  MANHATTAN = "Manhattan",
  EUCLIDEAN = "Euclidean",
  MINKOWSKI = "Minkowski",

  // Statement keywords
  VAR = "var",
  FUNC = "func",
  ITER = "iter",
  NAMESPACE = "namespace",
  FOR = "for",
  FOREACH = "foreach",
  WAIT = "wait",
  RETURN = "return",

  // Domain action keywords
  SURVEY = "Scan",
  SEGMENT = "Cluster",
  FILTER = "filter",
  MARK = "Mark",
  MANAGE = "Tighten",
  SCAN = "Search",
}

/**
 * Keyword lookup table.
 */
const keywords: Map<string, TokenKind> = new Map([
  ["true", TokenKind.TRUE],
  ["false", TokenKind.FALSE],
  ["void", TokenKind.VOID],
  ["drift", TokenKind.DRIFT],
  ["emission", TokenKind.EMISSION],
  ["focus", TokenKind.FOCUS],
  ["Manhattan", TokenKind.MANHATTAN],
  ["Euclidean", TokenKind.EUCLIDEAN],
  ["Minkowski", TokenKind.MINKOWSKI],
  ["var", TokenKind.VAR],
  ["func", TokenKind.FUNC],
  ["iter", TokenKind.ITER],
  ["namespace", TokenKind.NAMESPACE],
  ["for", TokenKind.FOR],
  ["foreach", TokenKind.FOREACH],
  ["wait", TokenKind.WAIT],
  ["return", TokenKind.RETURN],
  ["Scan", TokenKind.SURVEY],
  ["Cluster", TokenKind.SEGMENT],
  ["filter", TokenKind.FILTER],
  ["Mark", TokenKind.MARK],
  ["Tighten", TokenKind.MANAGE],
  ["Search", TokenKind.SCAN],
]);

/**
 * Keywords that introduce a statement. Panic-mode recovery stops before these.
 */
export const statementKeywords: ReadonlySet<TokenKind> = new Set([
  TokenKind.VAR,
  TokenKind.FUNC,
  TokenKind.ITER,
  TokenKind.NAMESPACE,
  TokenKind.FOR,
  TokenKind.FOREACH,
  TokenKind.WAIT,
  TokenKind.RETURN,
  TokenKind.SURVEY,
  TokenKind.SEGMENT,
  TokenKind.FILTER,
  TokenKind.MARK,
  TokenKind.MANAGE,
  TokenKind.SCAN,
]);

/**
 * Look up an identifier to determine if it's a keyword.
 */
export function lookupIdentifier(ident: string): TokenKind {
  return keywords.get(ident) ?? TokenKind.IDENT;
}

/**
 * Position in source code. Line and column are 0-indexed.
 */
export interface Position {
  /** Character offset in the input. */
  offset: number;
  /** 0-indexed line number. */
  line: number;
  /** 0-indexed column number. */
  column: number;
}

export function newPosition(offset: number, line: number, column: number): Position {
  return { offset, line, column };
}

/** 1-indexed line number. */
export function lineNumber(pos: Position): number {
  return pos.line + 1;
}

/** 1-indexed column number. */
export function columnNumber(pos: Position): number {
  return pos.column + 1;
}

/** Numeric base of a number literal. */
export type NumberBase = 2 | 10 | 16;

/**
 * Decoded value of a NUMBER, HEX or BIN token.
 */
export interface NumericLiteral {
  value: number;
  base: NumberBase;
}

/**
 * A lexical token.
 */
export interface Token {
  kind: TokenKind;
  /** Exact source text of the token. */
  lexeme: string;
  /**
   * Decoded text: the contents of a string or path, the message of an
   * ERROR token, otherwise the lexeme.
   */
  literal: string;
  /** Present on NUMBER, HEX and BIN tokens. */
  numeric?: NumericLiteral;
  start: Position;
}

export function newToken(
  kind: TokenKind,
  lexeme: string,
  start: Position,
  literal: string = lexeme,
  numeric?: NumericLiteral
): Token {
  return numeric === undefined
    ? { kind, lexeme, literal, start }
    : { kind, lexeme, literal, numeric, start };
}

/**
 * Format a token's location the way diagnostics show it, e.g. "3:5".
 */
export function formatPosition(pos: Position): string {
  return `${lineNumber(pos)}:${columnNumber(pos)}`;
}
