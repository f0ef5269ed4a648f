/**
 * File mode: scan a whole script in one pass
 */

import { DiagnosticCollector } from '@lumen/lexer';
import type { Logger } from '@lumen/logger';
import * as fs from 'node:fs';
import { ExitCode, SourceReadError } from '../errors.js';
import type { Reporter } from '../reporter.js';
import { runSource } from '../runner.js';

export interface RunFileOptions {
  reporter: Reporter;
  logger: Logger;
}

/**
 * @throws {SourceReadError} If the file cannot be read
 */
export function runFile(filePath: string, options: RunFileOptions): ExitCode {
  const logger = options.logger.child({ file: filePath });

  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    logger.error('source_read_failed', { error });
    throw new SourceReadError(filePath, error);
  }

  const sink = new DiagnosticCollector();
  runSource(source, { reporter: options.reporter, logger, sink });

  return sink.hadError ? ExitCode.DATA_ERROR : ExitCode.OK;
}
