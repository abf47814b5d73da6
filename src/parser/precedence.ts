/**
 * Operator precedence levels for Pratt parsing.
 */

import { TokenKind } from "../token/token.js";

/**
 * Precedence levels (lowest to highest).
 */
export const enum Precedence {
  NONE = 0,
  DECLARATION = 1,
  ASSIGN = 2, // =
  COMPARISON = 3, // == != < > <= >=
  TERM = 4, // + - |
  EXPONENT = 5, // ^
  PREFIX = 6, // -x !x, and the postfix x?
  CALL = 7, // f(x) and Enum.member
}

/**
 * Get the infix precedence of a token kind.
 */
export function getPrecedence(kind: TokenKind): Precedence {
  switch (kind) {
    case TokenKind.EQ:
    case TokenKind.NOT_EQ:
    case TokenKind.LT:
    case TokenKind.GT:
    case TokenKind.LT_EQUALS:
    case TokenKind.GT_EQUALS:
      return Precedence.COMPARISON;
    case TokenKind.PLUS:
    case TokenKind.MINUS:
    case TokenKind.PIPE:
      return Precedence.TERM;
    case TokenKind.CARET:
      return Precedence.EXPONENT;
    case TokenKind.QUESTION:
      return Precedence.PREFIX;
    case TokenKind.LPAREN:
    case TokenKind.DOT:
      return Precedence.CALL;
    default:
      return Precedence.NONE;
  }
}
