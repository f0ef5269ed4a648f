import type { TokenKind } from './token-types';

/**
 * Literal value carried by STRING and NUMBER tokens
 */
export type TokenLiteral = string | number;

/**
 * A token produced by the scanner
 */
export interface Token {
  /** The kind of token */
  readonly kind: TokenKind;
  /** The exact source text the token was scanned from (empty for EOF) */
  readonly lexeme: string;
  /** Raw string contents or parsed number; null for every other kind */
  readonly literal: TokenLiteral | null;
  /** 1-based line the token ended on */
  readonly line: number;
  /** 0-based offset of the first UTF-16 code unit */
  readonly start: number;
  /** 0-based offset one past the last UTF-16 code unit */
  readonly end: number;
}

export function createToken(
  kind: TokenKind,
  lexeme: string,
  literal: TokenLiteral | null,
  line: number,
  start: number,
  end: number,
): Token {
  return Object.freeze({ kind, lexeme, literal, line, start, end });
}

/**
 * Render a token as `KIND lexeme literal`
 *
 * @example
 * ```ts
 * formatToken(tokens[0]) // => 'NUMBER 1.5 1.5'
 * formatToken(eof)       // => 'EOF  null'
 * ```
 */
export function formatToken(token: Token): string {
  const literal = token.literal === null ? 'null' : String(token.literal);
  return `${token.kind} ${token.lexeme} ${literal}`;
}
