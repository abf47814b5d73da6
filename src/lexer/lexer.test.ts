import { describe, it, expect } from "vitest";
import { Lexer, tokenize } from "./lexer.js";
import { TokenKind } from "../token/token.js";

function kinds(input: string): TokenKind[] {
  return tokenize(input).map((t) => t.kind);
}

describe("Lexer", () => {
  describe("basic tokens", () => {
    it("should tokenize empty input", () => {
      const tokens = tokenize("");
      expect(tokens).toHaveLength(1);
      expect(tokens[0].kind).toBe(TokenKind.EOF);
      expect(tokens[0].lexeme).toBe("");
    });

    it("should keep returning EOF once exhausted", () => {
      const lexer = new Lexer("x");
      expect(lexer.nextToken().kind).toBe(TokenKind.IDENT);
      expect(lexer.nextToken().kind).toBe(TokenKind.EOF);
      expect(lexer.nextToken().kind).toBe(TokenKind.EOF);
    });

    it("should tokenize a variable declaration", () => {
      expect(kinds("var x = 1")).toEqual([
        TokenKind.VAR,
        TokenKind.IDENT,
        TokenKind.ASSIGN,
        TokenKind.NUMBER,
        TokenKind.EOF,
      ]);
    });

    it("should tokenize identifiers", () => {
      const tokens = tokenize("foo _bar baz2");
      expect(tokens.map((t) => t.lexeme)).toEqual(["foo", "_bar", "baz2", ""]);
      expect(tokens[0].kind).toBe(TokenKind.IDENT);
    });

    it("should tokenize keywords", () => {
      expect(kinds("var func iter namespace for foreach wait return")).toEqual([
        TokenKind.VAR,
        TokenKind.FUNC,
        TokenKind.ITER,
        TokenKind.NAMESPACE,
        TokenKind.FOR,
        TokenKind.FOREACH,
        TokenKind.WAIT,
        TokenKind.RETURN,
        TokenKind.EOF,
      ]);
    });

    it("should tokenize instrument actions", () => {
      expect(kinds("Scan Cluster filter Mark Tighten Search")).toEqual([
        TokenKind.SURVEY,
        TokenKind.SEGMENT,
        TokenKind.FILTER,
        TokenKind.MARK,
        TokenKind.MANAGE,
        TokenKind.SCAN,
        TokenKind.EOF,
      ]);
    });

    it("should tokenize tag literals", () => {
      expect(kinds("drift emission focus Manhattan Euclidean Minkowski true false void")).toEqual([
        TokenKind.DRIFT,
        TokenKind.EMISSION,
        TokenKind.FOCUS,
        TokenKind.MANHATTAN,
        TokenKind.EUCLIDEAN,
        TokenKind.MINKOWSKI,
        TokenKind.TRUE,
        TokenKind.FALSE,
        TokenKind.VOID,
        TokenKind.EOF,
      ]);
    });

    it("should treat keywords as case sensitive", () => {
      expect(kinds("scan Var")).toEqual([TokenKind.IDENT, TokenKind.IDENT, TokenKind.EOF]);
    });
  });

  describe("numbers", () => {
    it("should tokenize integers and decimals", () => {
      const tokens = tokenize("42 2.5");
      expect(tokens[0].numeric).toEqual({ value: 42, base: 10 });
      expect(tokens[1].numeric).toEqual({ value: 2.5, base: 10 });
      expect(tokens[1].lexeme).toBe("2.5");
    });

    it("should not take a trailing dot into a number", () => {
      expect(kinds("3.x")).toEqual([TokenKind.NUMBER, TokenKind.DOT, TokenKind.IDENT, TokenKind.EOF]);
    });

    it("should tokenize hexadecimal literals", () => {
      const tokens = tokenize("\\x1F \\XfF");
      expect(tokens[0].kind).toBe(TokenKind.HEX);
      expect(tokens[0].lexeme).toBe("\\x1F");
      expect(tokens[0].numeric).toEqual({ value: 31, base: 16 });
      expect(tokens[1].numeric).toEqual({ value: 255, base: 16 });
    });

    it("should tokenize binary literals", () => {
      const tokens = tokenize("\\b101");
      expect(tokens[0].kind).toBe(TokenKind.BIN);
      expect(tokens[0].numeric).toEqual({ value: 5, base: 2 });
    });

    it("should report a prefix without digits", () => {
      const hex = tokenize("\\x");
      expect(hex[0].kind).toBe(TokenKind.ERROR);
      expect(hex[0].literal).toBe("Expected hexadecimal digits");
      expect(hex[0].lexeme).toBe("\\x");

      const bin = tokenize("\\bz");
      expect(bin[0].literal).toBe("Expected binary digits");
      expect(bin[1].kind).toBe(TokenKind.IDENT);
      expect(bin[1].lexeme).toBe("z");
    });

    it("should reject literals beyond the safe integer range", () => {
      expect(tokenize("\\x1FFFFFFFFFFFFF")[0].numeric).toEqual({ value: 2 ** 53 - 1, base: 16 });
      const [token] = tokenize("\\x20000000000000");
      expect(token.kind).toBe(TokenKind.ERROR);
      expect(token.literal).toBe("Number literal is too large");
    });
  });

  describe("strings and paths", () => {
    it("should tokenize a string without its quotes", () => {
      const [token] = tokenize('"hello world"');
      expect(token.kind).toBe(TokenKind.STRING);
      expect(token.literal).toBe("hello world");
      expect(token.lexeme).toBe('"hello world"');
    });

    it("should tokenize a path", () => {
      const [token] = tokenize("'data/run1'");
      expect(token.kind).toBe(TokenKind.PATH);
      expect(token.literal).toBe("data/run1");
    });

    it("should allow newlines inside quotes", () => {
      const tokens = tokenize('"a\nb" x');
      expect(tokens[0].literal).toBe("a\nb");
      expect(tokens[1].start.line).toBe(1);
    });

    it("should report unterminated literals", () => {
      const str = tokenize('"abc');
      expect(str[0].kind).toBe(TokenKind.ERROR);
      expect(str[0].literal).toBe("Unterminated string");
      expect(str[1].kind).toBe(TokenKind.EOF);

      expect(tokenize("'abc")[0].literal).toBe("Unterminated path");
    });
  });

  describe("operators", () => {
    it("should tokenize every operator and delimiter", () => {
      expect(kinds("== != <= >= < > = ? ^ | + - ! , . ( ) [ ] { }")).toEqual([
        TokenKind.EQ,
        TokenKind.NOT_EQ,
        TokenKind.LT_EQUALS,
        TokenKind.GT_EQUALS,
        TokenKind.LT,
        TokenKind.GT,
        TokenKind.ASSIGN,
        TokenKind.QUESTION,
        TokenKind.CARET,
        TokenKind.PIPE,
        TokenKind.PLUS,
        TokenKind.MINUS,
        TokenKind.BANG,
        TokenKind.COMMA,
        TokenKind.DOT,
        TokenKind.LPAREN,
        TokenKind.RPAREN,
        TokenKind.LBRACKET,
        TokenKind.RBRACKET,
        TokenKind.LBRACE,
        TokenKind.RBRACE,
        TokenKind.EOF,
      ]);
    });

    it("should prefer the longest operator", () => {
      expect(kinds("a<=b")).toEqual([TokenKind.IDENT, TokenKind.LT_EQUALS, TokenKind.IDENT, TokenKind.EOF]);
      expect(kinds("a===b")).toEqual([
        TokenKind.IDENT,
        TokenKind.EQ,
        TokenKind.ASSIGN,
        TokenKind.IDENT,
        TokenKind.EOF,
      ]);
    });

    it("should report unknown symbols", () => {
      const tokens = tokenize("a @ b");
      expect(tokens[1].kind).toBe(TokenKind.ERROR);
      expect(tokens[1].literal).toBe("Unknown symbol '@'");
      expect(tokens[2].kind).toBe(TokenKind.IDENT);
    });
  });

  describe("positions", () => {
    it("should emit EOL for newlines and track lines", () => {
      const tokens = tokenize("a\nb");
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.IDENT,
        TokenKind.EOL,
        TokenKind.IDENT,
        TokenKind.EOF,
      ]);
      expect(tokens[1].lexeme).toBe("\n");
      expect(tokens[2].start).toEqual({ offset: 2, line: 1, column: 0 });
      expect(tokens[3].start.line).toBe(2);
      expect(tokens[3].start.column).toBe(0);
    });

    it("should track columns", () => {
      const tokens = tokenize("var count = 1");
      expect(tokens[1].start.column).toBe(4);
      expect(tokens[3].start.column).toBe(12);
    });

    it("should count a tab as four columns", () => {
      expect(tokenize("\tx")[0].start.column).toBe(4);
    });

    it("should ignore carriage returns", () => {
      expect(kinds("a\r\nb")).toEqual([TokenKind.IDENT, TokenKind.EOL, TokenKind.IDENT, TokenKind.EOF]);
    });
  });

  describe("lexemes", () => {
    it("should re-lex joined lexemes into the same kinds", () => {
      const source = [
        "var x = \\x1F + 2.5",
        "func f(a, b) { return a ^ 2 }",
        "foreach (var p = paths) { p? }",
        "'dir/file' == \"text\" != void",
      ].join("\n");
      const first = tokenize(source);
      const joined = first.map((t) => t.lexeme).join(" ");
      expect(kinds(joined)).toEqual(first.map((t) => t.kind));
    });
  });
});
