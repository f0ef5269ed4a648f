import { DiagnosticCollector, Scanner, type Token } from '@lumen/lexer';
import type { Logger } from '@lumen/logger';
import type { Reporter } from './reporter.js';

export interface RunContext {
  reporter: Reporter;
  logger: Logger;
  /** Shared across runs; the caller decides when to reset it */
  sink: DiagnosticCollector;
  scanner?: Scanner;
}

/**
 * Scan one complete source unit and report the result
 *
 * Tokens go to stdout and this run's diagnostics to stderr. Returns the
 * tokens so a later stage can take them.
 */
export function runSource(source: string, ctx: RunContext): Token[] {
  const scanner = ctx.scanner ?? new Scanner();
  const reportedBefore = ctx.sink.count;

  const tokens = scanner.scanTokens(source, ctx.sink);
  const diagnostics = ctx.sink.diagnostics.slice(reportedBefore);

  ctx.reporter.tokens(tokens);
  ctx.reporter.diagnostics(diagnostics);

  ctx.logger.debug('scan_completed', {
    length: source.length,
    tokens: tokens.length,
    diagnostics: diagnostics.length,
  });

  return tokens;
}
