/**
 * Lexer for Vela source code.
 *
 * Converts source text into a stream of tokens. Malformed input never
 * throws: it becomes an ERROR token whose literal carries the message.
 */

import {
  Token,
  TokenKind,
  Position,
  NumberBase,
  newToken,
  newPosition,
  lookupIdentifier,
} from "../token/token.js";

/** Columns a tab advances by. */
const TAB_WIDTH = 4;

/**
 * Multi-character symbols, checked before single characters.
 */
const multiCharTokens: Map<string, TokenKind> = new Map([
  ["==", TokenKind.EQ],
  ["!=", TokenKind.NOT_EQ],
  ["<=", TokenKind.LT_EQUALS],
  [">=", TokenKind.GT_EQUALS],
]);

/** Longest multi-character symbol. */
const MAX_SYMBOL_LENGTH = 3;

const singleCharTokens: Map<string, TokenKind> = new Map([
  [",", TokenKind.COMMA],
  [".", TokenKind.DOT],
  ["=", TokenKind.ASSIGN],
  ["?", TokenKind.QUESTION],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["[", TokenKind.LBRACKET],
  ["]", TokenKind.RBRACKET],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  ["-", TokenKind.MINUS],
  ["!", TokenKind.BANG],
  ["^", TokenKind.CARET],
  ["+", TokenKind.PLUS],
  ["|", TokenKind.PIPE],
  ["<", TokenKind.LT],
  [">", TokenKind.GT],
]);

/**
 * Lexer produces one token per call to nextToken().
 */
export class Lexer {
  private readonly characters: string[];
  private position: number = 0;
  private ch: string;
  private line: number = 0;
  private column: number = 0;
  private tokenStart: Position = newPosition(0, 0, 0);

  constructor(input: string) {
    this.characters = [...input];
    this.ch = this.characters[0] ?? "\0";
  }

  /**
   * Return the next token. Once the input is exhausted every call
   * returns an EOF token.
   */
  nextToken(): Token {
    this.skipWhitespace();
    this.tokenStart = newPosition(this.position, this.line, this.column);

    if (this.isAtEnd()) {
      return newToken(TokenKind.EOF, "", newPosition(this.position, this.line + 1, 0));
    }

    const ch = this.ch;

    if (ch === "\n") {
      this.readChar();
      return this.makeToken(TokenKind.EOL);
    }
    if (isLetter(ch)) {
      return this.readIdentifier();
    }
    if (isDigit(ch)) {
      return this.readNumber();
    }
    if (ch === "\\") {
      const prefix = this.peekChar().toLowerCase();
      if (prefix === "x") {
        return this.readPrefixedNumber(TokenKind.HEX, 16);
      }
      if (prefix === "b") {
        return this.readPrefixedNumber(TokenKind.BIN, 2);
      }
    }
    if (ch === '"') {
      return this.readQuoted(TokenKind.STRING, "string");
    }
    if (ch === "'") {
      return this.readQuoted(TokenKind.PATH, "path");
    }
    return this.readOperator();
  }

  // ===========================================================================
  // Character handling
  // ===========================================================================

  private isAtEnd(): boolean {
    return this.position >= this.characters.length;
  }

  private readChar(): void {
    if (this.isAtEnd()) {
      return;
    }
    if (this.ch === "\n") {
      this.line++;
      this.column = 0;
    } else if (this.ch === "\t") {
      this.column += TAB_WIDTH;
    } else {
      this.column++;
    }
    this.position++;
    this.ch = this.characters[this.position] ?? "\0";
  }

  private peekChar(): string {
    return this.characters[this.position + 1] ?? "\0";
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && (this.ch === " " || this.ch === "\t" || this.ch === "\r")) {
      this.readChar();
    }
  }

  private lexeme(): string {
    return this.characters.slice(this.tokenStart.offset, this.position).join("");
  }

  private makeToken(kind: TokenKind, literal?: string): Token {
    return newToken(kind, this.lexeme(), this.tokenStart, literal);
  }

  private errorToken(message: string): Token {
    return newToken(TokenKind.ERROR, this.lexeme(), this.tokenStart, message);
  }

  // ===========================================================================
  // Token readers
  // ===========================================================================

  private readIdentifier(): Token {
    while (isLetter(this.ch) || isDigit(this.ch)) {
      this.readChar();
    }
    return this.makeToken(lookupIdentifier(this.lexeme()));
  }

  private readNumber(): Token {
    while (isDigit(this.ch)) {
      this.readChar();
    }
    if (this.ch === "." && isDigit(this.peekChar())) {
      this.readChar();
      while (isDigit(this.ch)) {
        this.readChar();
      }
    }
    const lexeme = this.lexeme();
    return newToken(TokenKind.NUMBER, lexeme, this.tokenStart, lexeme, {
      value: parseFloat(lexeme),
      base: 10,
    });
  }

  private readPrefixedNumber(kind: TokenKind, base: NumberBase): Token {
    // Backslash and base letter
    this.readChar();
    this.readChar();
    const digitsStart = this.position;
    const isValid = base === 16 ? isHexDigit : isBinaryDigit;
    while (isValid(this.ch)) {
      this.readChar();
    }
    const digits = this.characters.slice(digitsStart, this.position).join("");
    if (digits === "") {
      return this.errorToken(
        base === 16 ? "Expected hexadecimal digits" : "Expected binary digits"
      );
    }
    const value = parseInt(digits, base);
    if (!Number.isSafeInteger(value)) {
      return this.errorToken("Number literal is too large");
    }
    const lexeme = this.lexeme();
    return newToken(kind, lexeme, this.tokenStart, lexeme, { value, base });
  }

  private readQuoted(kind: TokenKind, what: string): Token {
    const quote = this.ch;
    this.readChar();
    const contentStart = this.position;
    while (!this.isAtEnd() && this.ch !== quote) {
      this.readChar();
    }
    if (this.isAtEnd()) {
      return this.errorToken(`Unterminated ${what}`);
    }
    const content = this.characters.slice(contentStart, this.position).join("");
    this.readChar();
    return this.makeToken(kind, content);
  }

  private readOperator(): Token {
    for (let length = MAX_SYMBOL_LENGTH; length > 1; length--) {
      const candidate = this.characters.slice(this.position, this.position + length).join("");
      const kind = multiCharTokens.get(candidate);
      if (candidate.length === length && kind !== undefined) {
        for (let i = 0; i < length; i++) {
          this.readChar();
        }
        return this.makeToken(kind);
      }
    }

    const ch = this.ch;
    this.readChar();
    const kind = singleCharTokens.get(ch);
    if (kind !== undefined) {
      return this.makeToken(kind);
    }
    return this.errorToken(`Unknown symbol '${ch}'`);
  }
}

function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= "a" && ch <= "f") || (ch >= "A" && ch <= "F");
}

function isBinaryDigit(ch: string): boolean {
  return ch === "0" || ch === "1";
}

/**
 * Tokenize an entire input string. The last token is always EOF.
 */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.nextToken();
    tokens.push(token);
    if (token.kind === TokenKind.EOF) {
      return tokens;
    }
  }
}
