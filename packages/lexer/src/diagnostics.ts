/**
 * Lexical diagnostics
 *
 * The scanner never throws on bad input. It reports through a caller-owned
 * sink and keeps going; the caller reads the error flag once the scan returns.
 */

export const DiagnosticCode = {
  UNEXPECTED_CHARACTER: 'UNEXPECTED_CHARACTER',
  UNTERMINATED_STRING: 'UNTERMINATED_STRING',
} as const;

export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export interface Diagnostic {
  /** 1-based line the error was detected on */
  line: number;
  message: string;
  code?: DiagnosticCode;
}

/**
 * Receiver for lexical errors
 */
export interface DiagnosticSink {
  report(line: number, message: string, code?: DiagnosticCode): void;
}

/**
 * Sink that keeps every diagnostic in memory
 */
export class DiagnosticCollector implements DiagnosticSink {
  private entries: Diagnostic[] = [];

  report(line: number, message: string, code?: DiagnosticCode): void {
    this.entries.push({ line, message, code });
  }

  get hadError(): boolean {
    return this.entries.length > 0;
  }

  get count(): number {
    return this.entries.length;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  /** Forget everything reported so far */
  reset(): void {
    this.entries = [];
  }
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `[line ${diagnostic.line}] Error: ${diagnostic.message}`;
}
