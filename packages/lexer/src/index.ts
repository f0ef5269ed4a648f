/**
 * @lumen/lexer
 *
 * Lexical front end for the Lumen scripting language.
 */

export {
  DiagnosticCode,
  DiagnosticCollector,
  formatDiagnostic,
  type Diagnostic,
  type DiagnosticSink,
} from './diagnostics';
export { KEYWORDS, lookupKeyword } from './keywords';
export { Scanner, scanTokens } from './scanner';
export { createToken, formatToken, type Token, type TokenLiteral } from './token';
export { TokenKind } from './token-types';
