/**
 * Token kinds for the Lumen scanner
 *
 * Closed set. Every token the scanner produces carries exactly one of these.
 */

export const TokenKind = {
  // Single-character punctuation
  LEFT_PAREN: 'LEFT_PAREN', // (
  RIGHT_PAREN: 'RIGHT_PAREN', // )
  LEFT_BRACE: 'LEFT_BRACE', // {
  RIGHT_BRACE: 'RIGHT_BRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /

  // One- or two-character operators
  BANG: 'BANG', // !
  BANG_EQUAL: 'BANG_EQUAL', // !=
  EQUAL: 'EQUAL', // =
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=

  // Literals
  IDENTIFIER: 'IDENTIFIER', // foo, _bar, baz2
  STRING: 'STRING', // "hello"
  NUMBER: 'NUMBER', // 42, 3.14

  // Reserved words
  AND: 'AND',
  CLASS: 'CLASS',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FOR: 'FOR',
  FUN: 'FUN',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  // End of input
  EOF: 'EOF',
} as const;

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind];
