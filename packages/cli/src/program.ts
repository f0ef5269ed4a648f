/**
 * lumen command definition
 *
 *   lumen            interactive prompt
 *   lumen <script>   scan a file
 */

import { createLogger, type Logger, type LoggerConfig } from '@lumen/logger';
import { Command, CommanderError } from 'commander';
import * as path from 'node:path';
import { runPrompt } from './commands/prompt.js';
import { runFile } from './commands/run-file.js';
import { loadConfig } from './config.js';
import { CliError, ExitCode, UsageError } from './errors.js';
import { createReporter } from './reporter.js';

export const VERSION = '0.1.0';

export const USAGE = 'Usage: lumen [script]';

export interface CliContext {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd: string;
  env: Record<string, string | undefined>;
  createLogger?: (config: LoggerConfig) => Logger;
}

interface ProgramOptions {
  color: boolean;
  verbose?: boolean;
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function main(argv: readonly string[], ctx: CliContext): Promise<number> {
  let exitCode: number = ExitCode.OK;

  const program = new Command();

  program
    .name('lumen')
    .description('Scan Lumen source and print its tokens')
    .version(VERSION)
    .argument('[script...]', 'Script file to scan; omit for an interactive prompt')
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Log debug events to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => ctx.stdout.write(str),
      writeErr: (str) => ctx.stderr.write(str),
    })
    .action(async (scripts: string[], options: ProgramOptions) => {
      const reporter = createReporter({
        stdout: ctx.stdout,
        stderr: ctx.stderr,
        noColor: !options.color,
      });

      const config = loadConfig(ctx.cwd, ctx.env);
      const logger = (ctx.createLogger ?? createLogger)({
        environment: config.environment,
        minLevel: options.verbose ? 'debug' : config.logLevel,
        write: (line) => {
          ctx.stderr.write(`${line}\n`);
        },
      });

      try {
        if (scripts.length > 1) {
          throw new UsageError(USAGE);
        }

        exitCode =
          scripts.length === 1
            ? runFile(path.resolve(ctx.cwd, scripts[0]), { reporter, logger })
            : await runPrompt({ input: ctx.stdin, output: ctx.stdout, reporter, logger });
      } catch (error) {
        if (!(error instanceof CliError)) throw error;
        reporter.fail(error.message);
        exitCode = error.exitCode;
      }
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    // --help and --version end here with exit code 0
    return error.exitCode === 0 ? ExitCode.OK : ExitCode.USAGE;
  }

  return exitCode;
}
