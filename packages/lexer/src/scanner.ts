import { DiagnosticCode, type DiagnosticSink } from './diagnostics';
import { lookupKeyword } from './keywords';
import { createToken, type Token, type TokenLiteral } from './token';
import { TokenKind } from './token-types';

/**
 * Scanner for Lumen source text
 *
 * Single pass, maximal munch, at most two characters of lookahead. Offsets
 * are UTF-16 code units. Lexical errors go to the sink and scanning resumes
 * at the next character.
 */
export class Scanner {
  private source: string = '';
  private sink: DiagnosticSink | null = null;
  private tokens: Token[] = [];
  private start: number = 0;
  private current: number = 0;
  private line: number = 1;

  /**
   * Scan a complete source unit
   *
   * Always returns at least the EOF token.
   */
  scanTokens(source: string, sink: DiagnosticSink): Token[] {
    this.source = source;
    this.sink = sink;
    this.tokens = [];
    this.start = 0;
    this.current = 0;
    this.line = 1;

    while (!this.isAtEnd()) {
      // Beginning of the next lexeme
      this.start = this.current;
      this.scanToken();
    }

    this.tokens.push(
      createToken(TokenKind.EOF, '', null, this.line, this.current, this.current),
    );

    const tokens = this.tokens;
    this.tokens = [];
    this.sink = null;
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.current];
  }

  private peekNext(): string {
    if (this.current + 1 >= this.source.length) return '\0';
    return this.source[this.current + 1];
  }

  private advance(): string {
    return this.source[this.current++];
  }

  /** Consume the next character only if it is `expected` */
  private match(expected: string): boolean {
    if (this.isAtEnd()) return false;
    if (this.source[this.current] !== expected) return false;

    this.current++;
    return true;
  }

  private addToken(kind: TokenKind, literal: TokenLiteral | null = null): void {
    const lexeme = this.source.slice(this.start, this.current);
    this.tokens.push(createToken(kind, lexeme, literal, this.line, this.start, this.current));
  }

  private error(message: string, code: DiagnosticCode): void {
    this.sink?.report(this.line, message, code);
  }

  private scanToken(): void {
    const char = this.advance();

    switch (char) {
      case '(':
        this.addToken(TokenKind.LEFT_PAREN);
        break;
      case ')':
        this.addToken(TokenKind.RIGHT_PAREN);
        break;
      case '{':
        this.addToken(TokenKind.LEFT_BRACE);
        break;
      case '}':
        this.addToken(TokenKind.RIGHT_BRACE);
        break;
      case ',':
        this.addToken(TokenKind.COMMA);
        break;
      case '.':
        this.addToken(TokenKind.DOT);
        break;
      case '-':
        this.addToken(TokenKind.MINUS);
        break;
      case '+':
        this.addToken(TokenKind.PLUS);
        break;
      case ';':
        this.addToken(TokenKind.SEMICOLON);
        break;
      case '*':
        this.addToken(TokenKind.STAR);
        break;

      case '!':
        this.addToken(this.match('=') ? TokenKind.BANG_EQUAL : TokenKind.BANG);
        break;
      case '=':
        this.addToken(this.match('=') ? TokenKind.EQUAL_EQUAL : TokenKind.EQUAL);
        break;
      case '<':
        this.addToken(this.match('=') ? TokenKind.LESS_EQUAL : TokenKind.LESS);
        break;
      case '>':
        this.addToken(this.match('=') ? TokenKind.GREATER_EQUAL : TokenKind.GREATER);
        break;

      case '/':
        if (this.match('/')) {
          // The newline is left for the main loop so it still bumps the line counter
          while (this.peek() !== '\n' && !this.isAtEnd()) {
            this.advance();
          }
        } else {
          this.addToken(TokenKind.SLASH);
        }
        break;

      case ' ':
      case '\r':
      case '\t':
        break;

      case '\n':
        this.line++;
        break;

      case '"':
        this.string();
        break;

      default:
        if (this.isDigit(char)) {
          this.number();
        } else if (this.isAlpha(char)) {
          this.identifier();
        } else {
          this.unexpected(char);
        }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }

  private string(): void {
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.peek() === '\n') this.line++;
      this.advance();
    }

    if (this.isAtEnd()) {
      this.error('Unterminated String.', DiagnosticCode.UNTERMINATED_STRING);
      return;
    }

    this.advance(); // closing quote

    this.addToken(TokenKind.STRING, this.source.slice(this.start + 1, this.current - 1));
  }

  private number(): void {
    while (this.isDigit(this.peek())) this.advance();

    // A dot only belongs to the number when a digit follows it
    if (this.peek() === '.' && this.isDigit(this.peekNext())) {
      this.advance();
      while (this.isDigit(this.peek())) this.advance();
    }

    this.addToken(TokenKind.NUMBER, Number.parseFloat(this.source.slice(this.start, this.current)));
  }

  private identifier(): void {
    while (this.isAlphaNumeric(this.peek())) this.advance();

    const lexeme = this.source.slice(this.start, this.current);
    this.addToken(lookupKeyword(lexeme) ?? TokenKind.IDENTIFIER);
  }

  private unexpected(char: string): void {
    let text = char;

    // Keep a surrogate pair together so one character yields one diagnostic
    const code = char.charCodeAt(0);
    if (code >= 0xd800 && code <= 0xdbff && !this.isAtEnd()) {
      const next = this.source.charCodeAt(this.current);
      if (next >= 0xdc00 && next <= 0xdfff) {
        text += this.advance();
      }
    }

    this.error(`Unexpected character ${text}`, DiagnosticCode.UNEXPECTED_CHARACTER);
  }
}

/**
 * Scan `source` with a fresh scanner
 *
 * @example
 * ```ts
 * const sink = new DiagnosticCollector();
 * scanTokens('1+2', sink).map((t) => t.kind);
 * // => ['NUMBER', 'PLUS', 'NUMBER', 'EOF']
 * ```
 */
export function scanTokens(source: string, sink: DiagnosticSink): Token[] {
  return new Scanner().scanTokens(source, sink);
}
