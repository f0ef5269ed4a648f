import { TokenKind } from './token-types';

/**
 * Reserved words of the language
 *
 * Built once and never mutated. Lookup is exact and case-sensitive.
 */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['and', TokenKind.AND],
  ['class', TokenKind.CLASS],
  ['else', TokenKind.ELSE],
  ['false', TokenKind.FALSE],
  ['for', TokenKind.FOR],
  ['fun', TokenKind.FUN],
  ['if', TokenKind.IF],
  ['nil', TokenKind.NIL],
  ['or', TokenKind.OR],
  ['print', TokenKind.PRINT],
  ['return', TokenKind.RETURN],
  ['super', TokenKind.SUPER],
  ['this', TokenKind.THIS],
  ['true', TokenKind.TRUE],
  ['var', TokenKind.VAR],
  ['while', TokenKind.WHILE],
]);

export function lookupKeyword(lexeme: string): TokenKind | undefined {
  return KEYWORDS.get(lexeme);
}
