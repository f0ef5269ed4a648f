/**
 * Token and diagnostic output
 */

import { formatDiagnostic, formatToken, type Diagnostic, type Token } from '@lumen/lexer';
import chalk from 'chalk';

export interface ReporterOptions {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  noColor?: boolean;
}

export interface Reporter {
  /** One `KIND lexeme literal` line per token, on stdout */
  tokens(tokens: readonly Token[]): void;
  /** One `[line N] Error: message` line per diagnostic, on stderr */
  diagnostics(diagnostics: readonly Diagnostic[]): void;
  /** A message that ends the command, on stderr */
  fail(message: string): void;
}

type Colors = Record<'red', (s: string) => string>;

export function createReporter(options: ReporterOptions): Reporter {
  const c: Colors = options.noColor
    ? {
        red: (s: string) => s,
      }
    : chalk;

  const writeLine = (stream: NodeJS.WritableStream, line: string) => {
    stream.write(`${line}\n`);
  };

  return {
    tokens(tokens) {
      for (const token of tokens) {
        writeLine(options.stdout, formatToken(token));
      }
    },

    diagnostics(diagnostics) {
      for (const diagnostic of diagnostics) {
        writeLine(options.stderr, c.red(formatDiagnostic(diagnostic)));
      }
    },

    fail(message) {
      writeLine(options.stderr, c.red(message));
    },
  };
}
