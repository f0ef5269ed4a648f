/**
 * Prompt mode: scan each input line as its own source unit
 *
 * Nothing carries over between lines, so a string literal left open at the
 * end of a line is reported as unterminated.
 */

import { DiagnosticCollector, Scanner } from '@lumen/lexer';
import type { Logger } from '@lumen/logger';
import * as readline from 'node:readline';
import { ExitCode } from '../errors.js';
import type { Reporter } from '../reporter.js';
import { runSource } from '../runner.js';

export const PROMPT = '> ';

export interface PromptOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  reporter: Reporter;
  logger: Logger;
}

export async function runPrompt(options: PromptOptions): Promise<ExitCode> {
  const rl = readline.createInterface({ input: options.input, terminal: false });

  const sink = new DiagnosticCollector();
  const scanner = new Scanner();
  let lines = 0;

  options.output.write(PROMPT);

  try {
    for await (const line of rl) {
      lines++;
      runSource(line, {
        reporter: options.reporter,
        logger: options.logger.child({ line: lines }),
        sink,
        scanner,
      });
      // Each line starts with a clean error flag
      sink.reset();
      options.output.write(PROMPT);
    }
  } finally {
    rl.close();
  }

  options.logger.debug('prompt_closed', { lines });
  return ExitCode.OK;
}
